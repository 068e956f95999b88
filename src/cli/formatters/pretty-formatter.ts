/**
 * Pretty formatter for CLI output - human readable.
 */

import type { CheckResult, FormattableData, TemplateSummary } from '../types.js';
import type { OutputFormatter } from './index.js';

const ANSI = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  cyan: '\x1b[36m'
} as const;

type ColorName = Exclude<keyof typeof ANSI, 'reset'>;

export class PrettyFormatter implements OutputFormatter {
  constructor(private readonly useColors: boolean = true) {}

  format(data: FormattableData): string {
    switch (data.type) {
      case 'templates':
        return this.formatTemplates(data.data);
      case 'check':
        return this.formatCheck(data.data);
      case 'error':
        return this.color(`Error: ${data.data}`, 'red');
      case 'render':
      case 'message':
        return data.data;
    }
  }

  private formatTemplates(templates: TemplateSummary[]): string {
    if (templates.length === 0) {
      return this.color('No templates found.', 'dim');
    }

    const lines: string[] = [this.color(`Found ${templates.length} template(s):`, 'cyan'), ''];

    for (const template of templates) {
      lines.push(this.color(template.id, 'bold'));
      if (template.tokens.length === 0) {
        lines.push(`  ${this.color('(no tokens)', 'dim')}`);
      } else {
        lines.push(`  ${this.color('Tokens:', 'dim')} ${template.tokens.join(', ')}`);
      }
    }

    return lines.join('\n');
  }

  private formatCheck(result: CheckResult): string {
    const lines: string[] = [];

    if (result.valid) {
      lines.push(this.color(`✓ ${result.templateCount} template(s) checked, no problems found`, 'green'));
    } else {
      lines.push(this.color(`✗ ${result.errors.length} problem(s) in ${result.templateCount} template(s)`, 'red'));
      lines.push('');
      for (const e of result.errors) {
        lines.push(`  ✗ ${this.color(e.path, 'cyan')}: ${e.message}`);
      }
    }

    return lines.join('\n');
  }

  private color(text: string, color: ColorName): string {
    if (!this.useColors) {
      return text;
    }
    return `${ANSI[color]}${text}${ANSI.reset}`;
  }
}
