import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { StatusSnapshot } from '../metrics/interfaces';

/**
 * Read-only data handed to the status page.
 */
export interface StatusPageData extends StatusSnapshot {
  spamTestUrl: string;
}

/**
 * Turns a status snapshot into an HTML page.
 */
export abstract class StatusRenderer {
  abstract render(data: StatusPageData): string;
}

const DATA_BLOCK_REGEX = /let\s+mailServerData\s*=\s*\{[\s\S]*?\};/;

/**
 * Serializes page data as a JavaScript object literal, safe to embed inside a `<script>` element.
 */
export function serializeStatusData(data: StatusPageData): string {
  return JSON.stringify(data, null, 4).replace(/</g, '\\u003c');
}

/**
 * Fills the `let mailServerData = { ... };` block of the configured HTML template
 * with current values.
 */
@Injectable()
export class TemplateStatusRenderer extends StatusRenderer {
  private readonly logger = new Logger(TemplateStatusRenderer.name);
  private readonly template: string;
  private readonly hasDataBlock: boolean;

  constructor(configService: ConfigService) {
    super();
    this.template = configService.getOrThrow<string>('exporter.status.template');
    this.hasDataBlock = DATA_BLOCK_REGEX.test(this.template);
    if (!this.hasDataBlock) {
      const path = configService.get<string>('exporter.status.templatePath');
      this.logger.warn(`Status template ${path} has no "let mailServerData = {...};" block; serving it unchanged`);
    }
  }

  render(data: StatusPageData): string {
    if (!this.hasDataBlock) {
      return this.template;
    }
    const replacement = `let mailServerData = ${serializeStatusData(data)};`;
    return this.template.replace(DATA_BLOCK_REGEX, () => replacement);
  }
}
