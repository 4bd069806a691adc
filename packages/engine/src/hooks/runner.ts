/**
 * Hook Runner
 *
 * Registers triggers and plugins and invokes them in registration order,
 * one at a time. A failing hook is logged and the run continues, unless
 * the hook is critical, in which case a HookError propagates.
 *
 * Blocking runs use the *Sync methods: a hook that returns a promise there
 * counts as a failed hook, and the promise is never awaited.
 *
 * @module @stepgraph/engine/hooks
 */

import { getLogger, type Logger } from '@stepgraph/core';
import { isPromiseLike } from '../modes/types.js';
import type { ExecutionContext } from '../run/context.js';
import type { StateContainer } from '../state/container.js';
import {
  DEFAULT_HOOK_CONFIG,
  HookError,
  type HookAmendment,
  type HookConfig,
  type HookMethod,
  type MaybePromise,
  type NodeHookEvent,
  type NodeResultHookEvent,
  type Plugin,
  type RunSummary,
  type Trigger,
} from './types.js';

// =============================================================================
// Results
// =============================================================================

/**
 * Result of a single hook execution
 */
export interface HookExecutionResult {
  hookName: string;
  method: HookMethod;
  success: boolean;
  durationMs: number;
  error?: string;
}

/**
 * Result of running all hooks for one event
 */
export interface HookRunResult {
  totalHooks: number;
  successfulHooks: number;
  failedHooks: number;
  results: HookExecutionResult[];
  totalDurationMs: number;
}

export interface BeforeNodeOutcome extends HookRunResult {
  /** False when a trigger vetoed the node */
  allowed: boolean;
  vetoedBy?: string;
}

export interface AfterNodeOutcome extends HookRunResult {
  amendments: Array<{ hookName: string; amendment: HookAmendment }>;
}

export interface RegisterOptions {
  /** Overrides the hook's own `critical` flag */
  critical?: boolean;
}

interface Registration<H> {
  hook: H;
  critical: boolean;
}

interface HookCall<T> {
  record: HookExecutionResult;
  value?: T;
}

function summarize(results: HookExecutionResult[], startTime: number): HookRunResult {
  return {
    totalHooks: results.length,
    successfulHooks: results.filter((r) => r.success).length,
    failedHooks: results.filter((r) => !r.success).length,
    results,
    totalDurationMs: Date.now() - startTime,
  };
}

// =============================================================================
// Hook Runner
// =============================================================================

/**
 * Usage:
 * ```typescript
 * const hooks = new HookRunner({ hookTimeoutMs: 1000 });
 * hooks.registerTrigger(new LoopGuardTrigger({ maxVisits: 10 }));
 * hooks.registerPlugin(new ExecutionStatsPlugin(), { critical: true });
 * ```
 */
export class HookRunner {
  private triggers: Registration<Trigger>[] = [];
  private plugins: Registration<Plugin>[] = [];
  private readonly config: HookConfig;
  private readonly logger: Logger;

  constructor(config?: Partial<HookConfig>, logger?: Logger) {
    this.config = { ...DEFAULT_HOOK_CONFIG, ...config };
    this.logger = logger ?? getLogger('hooks');
  }

  // ===========================================================================
  // Registration
  // ===========================================================================

  registerTrigger(trigger: Trigger, options: RegisterOptions = {}): void {
    if (this.isRegistered(trigger.name)) {
      this.logger.warn(`Hook already registered: ${trigger.name}, skipping duplicate`);
      return;
    }
    this.triggers.push({ hook: trigger, critical: options.critical ?? trigger.critical ?? false });
    this.logger.debug(`Trigger registered: ${trigger.name}`);
  }

  registerPlugin(plugin: Plugin, options: RegisterOptions = {}): void {
    if (this.isRegistered(plugin.name)) {
      this.logger.warn(`Hook already registered: ${plugin.name}, skipping duplicate`);
      return;
    }
    this.plugins.push({ hook: plugin, critical: options.critical ?? plugin.critical ?? false });
    this.logger.debug(`Plugin registered: ${plugin.name}`);
  }

  /**
   * Unregister a hook by name
   *
   * @returns true if a hook was found and removed
   */
  unregister(name: string): boolean {
    const before = this.triggers.length + this.plugins.length;
    this.triggers = this.triggers.filter((r) => r.hook.name !== name);
    this.plugins = this.plugins.filter((r) => r.hook.name !== name);
    return this.triggers.length + this.plugins.length < before;
  }

  getRegisteredHooks(): string[] {
    return [...this.triggers, ...this.plugins].map((r) => r.hook.name);
  }

  /**
   * Copy with the same config, logger and registrations. Runs register
   * graph-declared hooks on a copy so the shared runner stays unchanged.
   */
  clone(): HookRunner {
    const copy = new HookRunner(this.config, this.logger);
    copy.triggers = [...this.triggers];
    copy.plugins = [...this.plugins];
    return copy;
  }

  private isRegistered(name: string): boolean {
    return this.getRegisteredHooks().includes(name);
  }

  // ===========================================================================
  // Triggers
  // ===========================================================================

  beforeNodeSync(event: NodeHookEvent): BeforeNodeOutcome {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];

    for (const { hook, critical } of this.triggers) {
      const before = hook.before;
      if (!before) continue;
      const call = this.invokeSync(hook.name, critical, 'before', () => before.call(hook, event));
      results.push(call.record);
      if (call.value === false) {
        return { ...summarize(results, startTime), allowed: false, vetoedBy: hook.name };
      }
    }
    return { ...summarize(results, startTime), allowed: true };
  }

  async beforeNode(event: NodeHookEvent): Promise<BeforeNodeOutcome> {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];

    for (const { hook, critical } of this.triggers) {
      const before = hook.before;
      if (!before) continue;
      const call = await this.invokeAsync(hook.name, critical, 'before', () => before.call(hook, event));
      results.push(call.record);
      if (call.value === false) {
        return { ...summarize(results, startTime), allowed: false, vetoedBy: hook.name };
      }
    }
    return { ...summarize(results, startTime), allowed: true };
  }

  afterNodeSync(event: NodeResultHookEvent): AfterNodeOutcome {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];
    const amendments: AfterNodeOutcome['amendments'] = [];

    for (const { hook, critical } of this.triggers) {
      const after = hook.after;
      if (!after) continue;
      const call = this.invokeSync(hook.name, critical, 'after', () => after.call(hook, event));
      results.push(call.record);
      if (call.value) {
        amendments.push({ hookName: hook.name, amendment: call.value });
      }
    }
    return { ...this.report(summarize(results, startTime), event.node.id), amendments };
  }

  async afterNode(event: NodeResultHookEvent): Promise<AfterNodeOutcome> {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];
    const amendments: AfterNodeOutcome['amendments'] = [];

    for (const { hook, critical } of this.triggers) {
      const after = hook.after;
      if (!after) continue;
      const call = await this.invokeAsync(hook.name, critical, 'after', () => after.call(hook, event));
      results.push(call.record);
      if (call.value) {
        amendments.push({ hookName: hook.name, amendment: call.value });
      }
    }
    return { ...this.report(summarize(results, startTime), event.node.id), amendments };
  }

  // ===========================================================================
  // Plugins
  // ===========================================================================

  runStartSync(context: ExecutionContext): HookRunResult {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];
    for (const { hook, critical } of this.plugins) {
      const onRunStart = hook.onRunStart;
      if (!onRunStart) continue;
      results.push(this.invokeSync(hook.name, critical, 'onRunStart', () => onRunStart.call(hook, context)).record);
    }
    return summarize(results, startTime);
  }

  async runStart(context: ExecutionContext): Promise<HookRunResult> {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];
    for (const { hook, critical } of this.plugins) {
      const onRunStart = hook.onRunStart;
      if (!onRunStart) continue;
      results.push((await this.invokeAsync(hook.name, critical, 'onRunStart', () => onRunStart.call(hook, context))).record);
    }
    return summarize(results, startTime);
  }

  runEndSync(context: ExecutionContext, finalState: StateContainer, summary: RunSummary): HookRunResult {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];
    for (const { hook, critical } of this.plugins) {
      const onRunEnd = hook.onRunEnd;
      if (!onRunEnd) continue;
      results.push(
        this.invokeSync(hook.name, critical, 'onRunEnd', () => onRunEnd.call(hook, context, finalState, summary)).record
      );
    }
    return summarize(results, startTime);
  }

  async runEnd(context: ExecutionContext, finalState: StateContainer, summary: RunSummary): Promise<HookRunResult> {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];
    for (const { hook, critical } of this.plugins) {
      const onRunEnd = hook.onRunEnd;
      if (!onRunEnd) continue;
      const call = await this.invokeAsync(hook.name, critical, 'onRunEnd', () =>
        onRunEnd.call(hook, context, finalState, summary)
      );
      results.push(call.record);
    }
    return summarize(results, startTime);
  }

  errorSync(context: ExecutionContext, error: Error): HookRunResult {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];
    for (const { hook, critical } of this.plugins) {
      const onError = hook.onError;
      if (!onError) continue;
      results.push(this.invokeSync(hook.name, critical, 'onError', () => onError.call(hook, context, error)).record);
    }
    return summarize(results, startTime);
  }

  async error(context: ExecutionContext, error: Error): Promise<HookRunResult> {
    const startTime = Date.now();
    const results: HookExecutionResult[] = [];
    for (const { hook, critical } of this.plugins) {
      const onError = hook.onError;
      if (!onError) continue;
      results.push((await this.invokeAsync(hook.name, critical, 'onError', () => onError.call(hook, context, error))).record);
    }
    return summarize(results, startTime);
  }

  // ===========================================================================
  // Invocation
  // ===========================================================================

  private invokeSync<T>(
    hookName: string,
    critical: boolean,
    method: HookMethod,
    call: () => MaybePromise<T>
  ): HookCall<T> {
    const startTime = Date.now();
    try {
      const value = call();
      if (isPromiseLike(value)) {
        Promise.resolve(value).catch((error: unknown) => {
          this.logger.warn(`Discarded promise from hook ${hookName}.${method} rejected`, { hookName, error: String(error) });
        });
        throw new Error('Hook returned a promise during a synchronous run');
      }
      return { record: this.succeeded(hookName, method, startTime), value };
    } catch (error) {
      return { record: this.failed(hookName, critical, method, startTime, error) };
    }
  }

  private async invokeAsync<T>(
    hookName: string,
    critical: boolean,
    method: HookMethod,
    call: () => MaybePromise<T>
  ): Promise<HookCall<T>> {
    const startTime = Date.now();
    let timer: ReturnType<typeof setTimeout> | undefined;

    try {
      const timeoutPromise = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          reject(new Error(`Hook timeout after ${this.config.hookTimeoutMs}ms`));
        }, this.config.hookTimeoutMs);
      });

      const value = await Promise.race([Promise.resolve().then(call), timeoutPromise]);
      return { record: this.succeeded(hookName, method, startTime), value };
    } catch (error) {
      return { record: this.failed(hookName, critical, method, startTime, error) };
    } finally {
      clearTimeout(timer);
    }
  }

  private succeeded(hookName: string, method: HookMethod, startTime: number): HookExecutionResult {
    const durationMs = Date.now() - startTime;
    if (this.config.debug) {
      this.logger.debug(`Hook ${hookName}.${method} completed`, { hookName, durationMs });
    }
    return { hookName, method, success: true, durationMs };
  }

  /**
   * Log a failure; critical hooks escalate instead
   */
  private failed(
    hookName: string,
    critical: boolean,
    method: HookMethod,
    startTime: number,
    error: unknown
  ): HookExecutionResult {
    if (critical) {
      throw error instanceof HookError ? error : new HookError(hookName, method, error);
    }
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Hook ${hookName}.${method} failed: ${message}`, error, { hookName, method });
    return { hookName, method, success: false, durationMs: Date.now() - startTime, error: message };
  }

  private report(result: HookRunResult, nodeId: string): HookRunResult {
    if (this.config.debug && result.totalHooks > 0) {
      this.logger.debug(`Hooks completed: ${result.successfulHooks} success, ${result.failedHooks} failed`, {
        nodeId,
        results: result.results.map((r) => ({ name: r.hookName, success: r.success, durationMs: r.durationMs })),
      });
    }
    return result;
  }
}
