import { describe, it, expect } from 'vitest';

import { createTemplateValidator } from '../template-validator.js';
import { TemplateValidationError } from '../../shared/errors.js';

describe('createTemplateValidator', () => {
  const validator = createTemplateValidator();

  it('accepts plain text and well-formed template syntax', () => {
    expect(() => validator.validate({ path: '01_a.j2', contents: 'Just text.' })).not.toThrow();
    expect(() =>
      validator.validate({
        path: '02_b.j2',
        contents: 'Hello {{ user.name }}{% if admin %} (admin){% endif %}\n{% for t in tools %}- {{ t }}\n{% endfor %}',
      }),
    ).not.toThrow();
  });

  it('accepts with and autoescape blocks', () => {
    expect(() =>
      validator.validate({ path: '01_a.j2', contents: '{% with a = 1 %}{{ a }}{% endwith %}' }),
    ).not.toThrow();
    expect(() =>
      validator.validate({
        path: '02_b.j2',
        contents: '{% with %}plain{% endwith %}{% autoescape false %}{{ html }}{% endautoescape %}',
      }),
    ).not.toThrow();
  });

  it('rejects a with block that is never closed', () => {
    expect(() =>
      validator.validate({ path: '01_a.j2', contents: '{% with a = 1 %}{{ a }}' }),
    ).toThrow(TemplateValidationError);
  });

  it('checks syntax inside a with block', () => {
    expect(() =>
      validator.validate({ path: '01_a.j2', contents: '{% with a = 1 %}{{ a {% endwith %}' }),
    ).toThrow(TemplateValidationError);
  });

  it('rejects an unclosed block', () => {
    expect(() =>
      validator.validate({ path: '01_a.j2', contents: '{% if admin %}no end' }),
    ).toThrow(TemplateValidationError);
  });

  it('rejects an unclosed expression and names the file', () => {
    let caught: unknown;
    try {
      validator.validate({ path: '/work/01_a.j2', contents: 'Hello {{ name' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TemplateValidationError);
    expect(caught instanceof TemplateValidationError && caught.message).toMatch(
      /^Invalid template syntax in \/work\/01_a\.j2: /,
    );
    expect(caught instanceof TemplateValidationError && caught.context).toEqual({
      path: '/work/01_a.j2',
    });
  });
});
