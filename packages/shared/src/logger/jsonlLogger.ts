import * as fs from 'fs/promises';
import * as path from 'path';
import type { PipelineEvent } from '../types/events';
import { redactUnknown } from '../redaction';
import { ConsoleLogger } from './consoleLogger';
import type { Logger } from './types';

/**
 * Appends pipeline events, redacted, to a JSONL file; plain messages go to
 * the console. Appends are serialized so concurrent executions sharing one
 * file never interleave partial lines.
 */
export class JsonlLogger implements Logger {
  private readonly filePath: string;
  private readonly console: Logger;
  private readonly bindings: Record<string, unknown>;
  private readonly queue: { tail: Promise<void> };

  constructor(
    filePath: string,
    bindings: Record<string, unknown> = {},
    console: Logger = new ConsoleLogger({ bindings }),
    queue: { tail: Promise<void> } = { tail: Promise.resolve() },
  ) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.console = console;
    this.queue = queue;
  }

  log(event: PipelineEvent): Promise<void> {
    const { redacted } = redactUnknown(event);
    const line = JSON.stringify(redacted) + '\n';
    const write = this.queue.tail.then(() => this.append(line));
    this.queue.tail = write;
    return write;
  }

  async trace(event: PipelineEvent, message: string): Promise<void> {
    this.console.debug(message);
    await this.log(event);
  }

  debug(message: string) {
    return this.console.debug(message);
  }

  info(message: string) {
    return this.console.info(message);
  }

  warn(message: string) {
    return this.console.warn(message);
  }

  error(error: Error, message?: string) {
    return this.console.error(error, message);
  }

  child(bindings: Record<string, unknown>): Logger {
    const merged = { ...this.bindings, ...bindings };
    return new JsonlLogger(this.filePath, merged, this.console.child(bindings), this.queue);
  }

  private async append(line: string): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Logging must not fail an execution; report and continue.
      console.error(`Failed to write to event log at ${this.filePath}`, error);
    }
  }
}
