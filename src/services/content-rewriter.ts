import TurndownService from 'turndown';
import { ConfigurationError, errorMessage } from '@/core/errors';

export interface ReplacementRule {
  pattern: string;
  replacement: string;
}

interface CompiledRule {
  pattern: RegExp;
  replacement: string;
}

/**
 * Ordered regular-expression substitutions applied to post text and card URLs.
 *
 * Each rule runs once, globally, over the output of the previous rule.
 * Replacements use the JavaScript syntax for captures (`$1`, `$<name>`).
 */
export class ContentRewriter {
  private readonly rules: CompiledRule[];

  constructor(rules: readonly ReplacementRule[]) {
    this.rules = rules.map(({ pattern, replacement }) => {
      try {
        return { pattern: new RegExp(pattern, 'g'), replacement };
      } catch (error) {
        throw new ConfigurationError(`Invalid content replacement pattern "${pattern}": ${errorMessage(error)}`, {
          pattern
        });
      }
    });
  }

  get size(): number {
    return this.rules.length;
  }

  rewrite(text: string): string {
    if (!text) {
      return text;
    }

    let result = text;
    for (const rule of this.rules) {
      result = result.replace(rule.pattern, rule.replacement);
    }
    return result;
  }
}

let turndown: TurndownService | undefined;

function getTurndown(): TurndownService {
  if (!turndown) {
    turndown = new TurndownService({ br: '', headingStyle: 'atx', bulletListMarker: '-' });
    // Mastodon wraps links in visible/invisible spans; keep the text, drop the markup
    turndown.addRule('plainLinks', {
      filter: 'a',
      replacement: content => content
    });
    turndown.escape = (text: string) => text;
  }
  return turndown;
}

/**
 * Converts status HTML to plain Markdown-flavoured text.
 */
export function htmlToText(html: string): string {
  if (!html) {
    return '';
  }
  return getTurndown().turndown(html).trim();
}
