/**
 * Logging Trigger
 *
 * Writes one log line before and one after every node.
 *
 * @module @stepgraph/engine/hooks
 */

import { z } from 'zod';
import { getLogger, type Logger } from '@stepgraph/core';
import type { NodeHookEvent, NodeResultHookEvent, Trigger } from './types.js';

export const LoggingTriggerConfigSchema = z.object({
  level: z.enum(['debug', 'info']).default('debug'),
  /** Include the result's update keys in the after line */
  includeKeys: z.boolean().default(true),
});

export class LoggingTrigger implements Trigger {
  readonly name = 'logging';
  private readonly config: z.output<typeof LoggingTriggerConfigSchema>;

  constructor(
    config: z.input<typeof LoggingTriggerConfigSchema> = {},
    private readonly logger: Logger = getLogger('node-log')
  ) {
    this.config = LoggingTriggerConfigSchema.parse(config);
  }

  before(event: NodeHookEvent): void {
    this.write(`Node ${event.node.id} starting`, {
      executionId: event.context.executionId,
      nodeId: event.node.id,
      revision: event.state.revision,
      branch: event.branch,
    });
  }

  after(event: NodeResultHookEvent): void {
    this.write(`Node ${event.node.id} finished`, {
      executionId: event.context.executionId,
      nodeId: event.node.id,
      attempt: event.attempt,
      durationMs: event.durationMs,
      updatedKeys: this.config.includeKeys ? Object.keys(event.result.update ?? {}) : undefined,
      branch: event.branch,
    });
  }

  private write(message: string, data: Record<string, unknown>): void {
    if (this.config.level === 'info') {
      this.logger.info(message, data);
    } else {
      this.logger.debug(message, data);
    }
  }
}
