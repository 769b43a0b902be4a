import nunjucks from 'nunjucks';

import { TemplateValidationError } from '../shared/errors.js';
import type { WorkingFile } from '../shared/types.js';

/**
 * Syntax check run on every commit candidate before any write.
 */
export interface TemplateValidator {
  /** @throws TemplateValidationError when the file does not parse */
  validate(file: Pick<WorkingFile, 'path' | 'contents'>): void;
}

/**
 * Jinja2 block tags that nunjucks has no parser for. Each is parsed as
 * `{% tag args %} ... {% endtag %}`: arguments and body are checked for
 * syntax, and the body compiles as plain output without any scoping.
 */
export const PASSTHROUGH_BLOCK_TAGS = ['with', 'autoescape'] as const;

// Tags of optional Jinja2 extensions (`do`, `trans`) stay unknown, as they
// are in a default Jinja2 environment.
const passthroughBlocks: nunjucks.Extension = {
  tags: [...PASSTHROUGH_BLOCK_TAGS],
  parse(parser) {
    const tag = parser.nextToken();
    parser.parseSignature(null, true);
    parser.advanceAfterBlockEnd(tag.value);

    const body = parser.parseUntilBlocks(`end${tag.value}`);
    parser.advanceAfterBlockEnd();

    return body;
  },
};

/**
 * Validator backed by nunjucks, which parses Jinja2 template syntax.
 * Templates are compiled eagerly and never rendered.
 */
export function createTemplateValidator(): TemplateValidator {
  const env = new nunjucks.Environment(null, { autoescape: false });
  env.addExtension('JinjaPassthroughBlocks', passthroughBlocks);

  return {
    validate(file) {
      try {
        new nunjucks.Template(file.contents, env, file.path, true);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        throw new TemplateValidationError(file.path, detail, err);
      }
    },
  };
}
