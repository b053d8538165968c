/**
 * ToolDispatcher: the single path from an agent's request to a
 * collaborator.
 *
 * Per call:
 *   1. Resolve (or lazily create) the session.
 *   2. Under the session lock, snapshot the state and run the gate.
 *   3. Release the lock. Blocked: return the rejection; the handler is
 *      never invoked. Approved: run the handler and report its result or
 *      its failure.
 *
 * Middleware wraps steps 1-3 in array order, outermost first.
 */

import { toCollaboratorFailure } from "../collaborators/errors.js";
import { GateError } from "../gate/errors.js";
import { evaluateActionGate } from "../gate/gate.js";
import { ACTION_KINDS, type ActionKind } from "../gate/requirements.js";
import type { SessionRegistry } from "../session/registry.js";
import { nextStepsFor } from "./guidance.js";
import type {
  ActionHandler,
  DispatchCall,
  DispatchMiddleware,
  DispatchOptions,
  DispatchOutcome,
  HandlerTable,
} from "./types.js";

export interface ToolDispatcherOptions {
  registry: SessionRegistry;
  handlers: HandlerTable;
  middleware?: readonly DispatchMiddleware[];
}

export class ToolDispatcher {
  private readonly registry: SessionRegistry;
  private readonly handlers: ReadonlyMap<ActionKind, ActionHandler>;
  private readonly middleware: readonly DispatchMiddleware[];

  /**
   * @throws GateError with code HANDLER_MISSING when an action in the
   *   requirement table has no handler.
   */
  constructor(options: ToolDispatcherOptions) {
    const handlers = new Map<ActionKind, ActionHandler>();
    const missing: ActionKind[] = [];
    for (const kind of ACTION_KINDS) {
      const handler = options.handlers[kind];
      if (handler) {
        handlers.set(kind, handler);
      } else {
        missing.push(kind);
      }
    }
    if (missing.length > 0) {
      throw new GateError(
        `No handler registered for: ${missing.join(", ")}`,
        "HANDLER_MISSING",
        { missing },
      );
    }

    this.registry = options.registry;
    this.handlers = handlers;
    this.middleware = options.middleware ?? [];
  }

  dispatch(call: DispatchCall, options: DispatchOptions = {}): Promise<DispatchOutcome> {
    const run = (index: number): Promise<DispatchOutcome> => {
      const layer = this.middleware[index];
      if (!layer) {
        return this.evaluateAndRun(call, options);
      }
      return layer(call, () => run(index + 1));
    };
    return run(0);
  }

  private async evaluateAndRun(
    call: DispatchCall,
    options: DispatchOptions,
  ): Promise<DispatchOutcome> {
    const session = this.registry.getOrCreate(call.sessionId);
    const verdict = await session.withExclusive((state) =>
      evaluateActionGate(state.snapshot(), {
        actionKind: call.actionKind,
        resourceRefs: call.resourceRefs,
        payload: call.payload,
      }),
    );

    if (verdict.status === "blocked") {
      return {
        approved: false,
        outcome: "blocked",
        reasonKind: verdict.reasonKind,
        details: verdict.details,
        nextSteps: nextStepsFor(verdict),
      };
    }

    const handler = this.handlers.get(verdict.actionKind);
    if (!handler) {
      throw new GateError(
        `No handler registered for: ${verdict.actionKind}`,
        "HANDLER_MISSING",
        { missing: [verdict.actionKind] },
      );
    }

    try {
      const result = await handler.run(verdict.payload, {
        sessionId: call.sessionId,
        resourceRefs: call.resourceRefs,
        signal: options.signal,
      });
      return { approved: true, outcome: "completed", actionKind: verdict.actionKind, result };
    } catch (err: unknown) {
      if (err instanceof GateError) {
        throw err;
      }
      return {
        approved: true,
        outcome: "collaborator_error",
        actionKind: verdict.actionKind,
        error: toCollaboratorFailure(err, handler.collaborator),
      };
    }
  }
}
