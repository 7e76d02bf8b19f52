import type { Logger } from 'pino';
import { errorMessage } from '../utils/logger.js';

/**
 * Sink for streamed model text. Delivery is best effort.
 */
export interface OutputChannel {
  emit(agentId: string, textDelta: string): void;
}

export class NullOutputChannel implements OutputChannel {
  emit(): void {}
}

export interface StreamOutputChannelOptions {
  /** Print `[agentId] ` whenever the speaking agent changes */
  prefix?: boolean;
}

export class StreamOutputChannel implements OutputChannel {
  private lastAgentId: string | null = null;

  constructor(
    private stream: NodeJS.WritableStream,
    private options: StreamOutputChannelOptions = {}
  ) {}

  emit(agentId: string, textDelta: string): void {
    if (this.options.prefix && agentId !== this.lastAgentId) {
      this.stream.write(`${this.lastAgentId === null ? '' : '\n'}[${agentId}] `);
    }
    this.lastAgentId = agentId;
    this.stream.write(textDelta);
  }
}

/**
 * Emit without letting a failing sink affect the run.
 */
export function emitSafely(channel: OutputChannel, agentId: string, textDelta: string, logger: Logger): void {
  try {
    channel.emit(agentId, textDelta);
  } catch (error) {
    logger.warn({ agentId, error: errorMessage(error) }, 'Output channel failed');
  }
}
