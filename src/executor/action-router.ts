/**
 * Action Router
 *
 * Routes resolved intents to the executor registered for them. Intents with a
 * response template get a template executor unless something else is
 * registered. Routing never throws: a missing executor or a failing one comes
 * back as an unsuccessful ExecutionResult.
 */

import { EventEmitter } from "node:events";
import { TEMPLATE_PLACEHOLDER, type IntentRegistry } from "../registry/intent-registry.js";
import { DispatchErrorCode, DispatchErrorHandler } from "../utils/error-handler.js";
import type { ExecutionResult, ResolvedDispatch } from "../types.js";

/**
 * What an executor reports back
 */
export interface ActionOutcome {
  success: boolean;
  message?: string;
  error?: string;
}

/**
 * Performs the action behind one intent
 */
export interface ActionExecutor {
  execute(resolved: ResolvedDispatch): Promise<ActionOutcome>;
}

/**
 * Execution event types
 */
export type ExecutionEventType = "execution_start" | "execution_complete";

export interface ExecutionEvent {
  type: ExecutionEventType;
  intent: string;
  data: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Fill a response template from bindings. {label|fallback} uses the fallback
 * when the label is unbound; an unbound {label} renders as the label.
 */
export function renderTemplate(template: string, bindings: Readonly<Record<string, string>>): string {
  return template.replace(TEMPLATE_PLACEHOLDER, (_match, label: string, fallback?: string) => {
    if (Object.hasOwn(bindings, label)) {
      return bindings[label];
    }
    return fallback ?? label;
  });
}

/**
 * Executor that answers with the intent's response template
 */
export class TemplateExecutor implements ActionExecutor {
  constructor(private readonly template: string) {}

  async execute(resolved: ResolvedDispatch): Promise<ActionOutcome> {
    return {
      success: true,
      message: renderTemplate(this.template, resolved.bindings),
    };
  }
}

/**
 * Action Router class
 */
export class ActionRouter extends EventEmitter {
  private executors: Map<string, ActionExecutor> = new Map();
  private registry: IntentRegistry;
  private errorHandler: DispatchErrorHandler;

  constructor(
    registry: IntentRegistry,
    options: { errorHandler?: DispatchErrorHandler; useTemplates?: boolean } = {}
  ) {
    super();
    this.registry = registry;
    this.errorHandler = options.errorHandler ?? new DispatchErrorHandler();

    if (options.useTemplates ?? true) {
      for (const definition of registry.list()) {
        if (definition.response) {
          this.executors.set(definition.name, new TemplateExecutor(definition.response));
        }
      }
    }
  }

  /**
   * Register the executor for an intent, replacing any previous one
   */
  register(intent: string, executor: ActionExecutor): this {
    if (!this.registry.has(intent)) {
      throw new Error(`Cannot register executor for unknown intent: ${intent}`);
    }
    this.executors.set(intent, executor);
    return this;
  }

  /**
   * Whether an intent has an executor
   */
  has(intent: string): boolean {
    return this.executors.has(intent);
  }

  /**
   * Execute a resolved intent
   */
  async route(resolved: ResolvedDispatch): Promise<ExecutionResult> {
    const startTime = Date.now();
    const executor = this.executors.get(resolved.intent);

    if (!executor) {
      const error = this.errorHandler.createError(
        DispatchErrorCode.EXECUTOR_NOT_FOUND,
        `No executor registered for intent: ${resolved.intent}`,
        { intent: resolved.intent }
      );
      return {
        success: false,
        error: error.message,
        code: error.code,
        duration_ms: Date.now() - startTime,
        intent: resolved.intent,
      };
    }

    this.emitEvent("execution_start", resolved.intent, { bindings: resolved.bindings });

    let result: ExecutionResult;
    try {
      const outcome = await executor.execute(resolved);
      result = {
        success: outcome.success,
        message: outcome.message,
        duration_ms: Date.now() - startTime,
        intent: resolved.intent,
      };
      if (!outcome.success) {
        const error = this.errorHandler.createError(
          DispatchErrorCode.EXECUTOR_FAILED,
          outcome.error ?? `Executor for ${resolved.intent} reported failure`,
          { intent: resolved.intent }
        );
        console.error(`[ActionRouter] ${resolved.intent} failed: ${error.message}`);
        result.error = error.message;
        result.code = error.code;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Executor failed";
      console.error(`[ActionRouter] ${resolved.intent} failed: ${message}`);
      const recorded = this.errorHandler.createError(DispatchErrorCode.EXECUTOR_FAILED, message, {
        intent: resolved.intent,
      });
      result = {
        success: false,
        error: recorded.message,
        code: recorded.code,
        duration_ms: Date.now() - startTime,
        intent: resolved.intent,
      };
    }

    this.emitEvent("execution_complete", resolved.intent, {
      success: result.success,
      duration_ms: result.duration_ms,
    });
    return result;
  }

  private emitEvent(type: ExecutionEventType, intent: string, data: Record<string, unknown>): void {
    const event: ExecutionEvent = { type, intent, data, timestamp: new Date() };
    this.emit(type, event);
  }
}

/**
 * Create an ActionRouter instance
 */
export function createActionRouter(
  registry: IntentRegistry,
  options: { errorHandler?: DispatchErrorHandler; useTemplates?: boolean } = {}
): ActionRouter {
  return new ActionRouter(registry, options);
}
