/**
 * Turn Orchestrator
 *
 * One utterance in, one DispatchResult out:
 *
 *   START → GRAMMAR_MATCHED | CLASSIFY → TASK_PATH | EVENT_PATH | QA_PATH
 *         → DISPATCH → LOGGED → DONE
 *
 * An explicit command skips classification and extraction. Task creation
 * prefers a remote workspace capability when one resolves; a remote failure
 * naming a rejected property gets exactly one retry without it, and any
 * other failure (including a timeout) falls back to the local todo list
 * with a degradation note in the reply.
 *
 * Nothing is carried between turns. Remote capabilities are discovered at
 * the start of every task turn and released before it ends.
 */

import { TOOL_NAMES } from "../config/constants";
import type { CalendarProvider, LocalTaskProvider } from "../providers/types";
import type { CapabilitySourceRegistry } from "../providers/registry";
import {
  buildPagePayload,
  findRejectedProperty,
  type WorkspaceTarget,
} from "../providers/workspacePayload";
import type { RagAnswerer } from "../rag/types";
import { ValidationError } from "../utils/errorHandler";
import { TurnTrace } from "../utils/logger";
import { withTimeout } from "../utils/timeout";
import { attemptInOrder, type ProviderAttempt } from "./attempts";
import { resolveCapability } from "./capabilityResolver";
import { parseCommand } from "./commandGrammar";
import type { IntentClassifier } from "./intentClassifier";
import {
  calendarEventReply,
  localTodoReply,
  withDegradationNote,
  workspaceTodoReply,
} from "./replies";
import type { SlotExtractor } from "./slotExtractor";
import type { TurnLogger } from "./turnLogger";
import {
  Intent,
  createUtterance,
  type Capability,
  type DispatchResult,
  type EventSlots,
  type IntentDetectionMethod,
  type TaskSlots,
  type Utterance,
} from "./types";

export type TurnState =
  | "START"
  | "GRAMMAR_MATCHED"
  | "CLASSIFY"
  | "TASK_PATH"
  | "EVENT_PATH"
  | "QA_PATH"
  | "DISPATCH"
  | "LOGGED"
  | "DONE";

export type TurnOrchestratorDeps = {
  classifier: IntentClassifier;
  extractor: SlotExtractor;
  capabilities: CapabilitySourceRegistry;
  localTasks: LocalTaskProvider;
  calendar: CalendarProvider;
  rag: RagAnswerer;
  turnLogger: TurnLogger;
  /** Where remote todos are written; without it no remote attempt is made */
  workspace?: WorkspaceTarget;
  timeoutMs: number;
  clock?: () => Date;
};

type PathResult = Omit<DispatchResult, "intent" | "detectionMethod">;

type TaskCreation = {
  reply: string;
  toolName: string;
};

const LOCAL_PROVIDER = "local";

export class TurnOrchestrator {
  private readonly clock: () => Date;

  constructor(private readonly deps: TurnOrchestratorDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  async handle(message: string): Promise<DispatchResult> {
    if (!message.trim()) {
      throw new ValidationError("Message must not be empty.");
    }

    const trace = new TurnTrace();
    try {
      return await this.runTurn(createUtterance(message), trace);
    } catch (error) {
      trace.error("[Turn] Turn failed", error, { totalMs: trace.getDuration() });
      throw error;
    }
  }

  private async runTurn(utterance: Utterance, trace: TurnTrace): Promise<DispatchResult> {
    const now = this.clock();
    const transition = (state: TurnState, extra?: Record<string, unknown>) =>
      trace.info(`[Turn] ${state}`, { stage: state, ...extra });

    transition("START");
    const command = parseCommand(utterance);

    let intent: Intent;
    let detectionMethod: IntentDetectionMethod;
    let path: PathResult;

    if (command) {
      detectionMethod = "grammar";
      transition("GRAMMAR_MATCHED", { command: command.kind });
      if (command.kind === "task") {
        intent = Intent.CREATE_TASK;
        path = await this.taskPath(command.slots, trace);
      } else {
        intent = Intent.CREATE_EVENT;
        path = await this.eventPath(command.slots, now);
      }
    } else {
      detectionMethod = "llm";
      transition("CLASSIFY");
      trace.startStage("classify");
      intent = await this.deps.classifier.classify(utterance);
      trace.endStage("classify");
      path = await this.classifiedPath(intent, utterance, now, trace, transition);
    }

    const result: DispatchResult = { ...path, intent, detectionMethod };
    transition("DISPATCH", { intent, tools: result.toolsUsed, degraded: result.degraded });

    trace.startStage("log");
    const stored = await this.deps.turnLogger.record({
      userMessage: utterance.raw,
      reply: result.reply,
      toolsUsed: result.toolsUsed,
      retrievedIds: result.retrievedIds,
      intent,
    });
    trace.endStage("log");
    if (stored) {
      transition("LOGGED");
    } else {
      trace.warn("[Turn] Turn record was not stored");
    }

    transition("DONE", { totalMs: trace.getDuration() });
    return result;
  }

  private async classifiedPath(
    intent: Intent,
    utterance: Utterance,
    now: Date,
    trace: TurnTrace,
    transition: (state: TurnState, extra?: Record<string, unknown>) => void,
  ): Promise<PathResult> {
    switch (intent) {
      case Intent.CREATE_TASK: {
        transition("TASK_PATH");
        trace.startStage("extract");
        const slots = await this.deps.extractor.extractTask(utterance, now);
        trace.endStage("extract");
        return this.taskPath(slots, trace);
      }
      case Intent.CREATE_EVENT: {
        transition("EVENT_PATH");
        trace.startStage("extract");
        const slots = await this.deps.extractor.extractEvent(utterance, now);
        trace.endStage("extract");
        return this.eventPath(slots, now);
      }
      case Intent.ANSWER_QUESTION:
        transition("QA_PATH");
        return this.questionPath(utterance);
    }
  }

  private async taskPath(slots: TaskSlots, trace: TurnTrace): Promise<PathResult> {
    const { workspace } = this.deps;
    if (!workspace || this.deps.capabilities.size === 0) {
      const created = await this.createLocally(slots);
      return { reply: created.reply, toolsUsed: [created.toolName], retrievedIds: [], degraded: false };
    }

    trace.startStage("dispatch");
    const discovered = await this.deps.capabilities.discover();
    try {
      const resolution = resolveCapability(Intent.CREATE_TASK, discovered.capabilities);
      const attempts: ProviderAttempt<TaskCreation>[] = [];

      if (resolution) {
        trace.info("[Turn] Remote capability resolved", {
          tool: resolution.capability.name,
          strategy: resolution.strategy,
        });
        attempts.push(this.remoteTaskAttempt(resolution.capability, slots, workspace, new Set()));
      } else {
        trace.info("[Turn] No remote capability matched; using the local todo list", {
          discovered: discovered.capabilities.map(c => c.name),
        });
      }
      attempts.push({
        provider: LOCAL_PROVIDER,
        run: async () => ({ status: "success", value: await this.createLocally(slots) }),
      });

      const outcome = await attemptInOrder(attempts);
      for (const failure of outcome.failures) {
        trace.warn("[Turn] Task provider attempt failed", { tool: failure.provider, error: failure.error.message });
      }

      const toolsUsed = resolution ? [resolution.capability.name] : [];
      if (outcome.provider === LOCAL_PROVIDER) {
        toolsUsed.push(outcome.value.toolName);
      }

      const lastFailure = outcome.failures[outcome.failures.length - 1];
      const degraded = outcome.provider === LOCAL_PROVIDER && lastFailure !== undefined;
      return {
        reply: degraded ? withDegradationNote(outcome.value.reply, lastFailure.error.message) : outcome.value.reply,
        toolsUsed,
        retrievedIds: [],
        degraded,
      };
    } finally {
      trace.endStage("dispatch");
      await discovered.close();
    }
  }

  private remoteTaskAttempt(
    capability: Capability,
    slots: TaskSlots,
    target: WorkspaceTarget,
    omit: ReadonlySet<string>,
  ): ProviderAttempt<TaskCreation> {
    return {
      provider: capability.name,
      run: async () => {
        const payload = buildPagePayload(slots, target, omit);
        const envelope = await withTimeout(
          capability.invoke(payload),
          this.deps.timeoutMs,
          `${capability.name} invocation`,
        );

        if (envelope.ok) {
          const due = omit.has(target.dueProperty) ? null : slots.due;
          return {
            status: "success",
            value: { reply: workspaceTodoReply(slots.text, due, envelope.url), toolName: capability.name },
          };
        }

        const error = new Error(envelope.message);
        const rejected = omit.size === 0 ? findRejectedProperty(envelope.message, payload) : null;
        if (rejected) {
          return {
            status: "retryable",
            error,
            retry: this.remoteTaskAttempt(capability, slots, target, new Set([rejected])),
          };
        }
        return { status: "fatal", error };
      },
    };
  }

  private async createLocally(slots: TaskSlots): Promise<TaskCreation> {
    const todo = await withTimeout(
      this.deps.localTasks.create(slots.text, slots.due),
      this.deps.timeoutMs,
      "Local todo creation",
    );
    return { reply: localTodoReply(todo), toolName: TOOL_NAMES.CREATE_TODO };
  }

  private async eventPath(slots: EventSlots, now: Date): Promise<PathResult> {
    const created = await withTimeout(
      this.deps.calendar.createEvent({ title: slots.title, start: slots.start, end: slots.end }),
      this.deps.timeoutMs,
      "Calendar event creation",
    );
    return {
      reply: calendarEventReply({ ...slots, link: created.link }, now),
      toolsUsed: [TOOL_NAMES.CREATE_EVENT],
      retrievedIds: [],
      degraded: false,
    };
  }

  private async questionPath(utterance: Utterance): Promise<PathResult> {
    const answer = await this.deps.rag.answer(utterance.raw);
    return { reply: answer.reply, toolsUsed: [], retrievedIds: answer.retrievedIds, degraded: false };
  }
}
