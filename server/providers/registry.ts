/**
 * Capability source registry.
 *
 * Sources are opened one after another at the start of every task turn.
 * A source that fails or exceeds the bound is skipped so the turn can
 * continue with whatever the others offer (possibly nothing).
 */

import type { Capability } from "../assistant/types";
import { TimeoutError, getErrorMessage } from "../utils/errorHandler";
import { logWarn } from "../utils/logger";
import { withTimeout } from "../utils/timeout";
import type { CapabilitySession, CapabilitySource } from "./types";

export type DiscoveredCapabilities = {
  capabilities: Capability[];
  /** Names of the sources that answered */
  sources: string[];
  close(): Promise<void>;
};

export class CapabilitySourceRegistry {
  private readonly sources: CapabilitySource[] = [];

  constructor(private readonly timeoutMs: number) {}

  register(source: CapabilitySource): void {
    if (this.sources.some(s => s.name === source.name)) {
      throw new Error(`Capability source already registered: ${source.name}`);
    }
    this.sources.push(source);
  }

  get size(): number {
    return this.sources.length;
  }

  async discover(): Promise<DiscoveredCapabilities> {
    const sessions: CapabilitySession[] = [];
    const answered: string[] = [];

    for (const source of this.sources) {
      const opening = source.open();
      try {
        sessions.push(await withTimeout(opening, this.timeoutMs, `${source.name} capability discovery`));
        answered.push(source.name);
      } catch (err) {
        logWarn(`[Capabilities] Skipping source ${source.name}`, { error: getErrorMessage(err) });
        if (err instanceof TimeoutError) {
          // A session that connects after the bound still has to be shut down
          opening
            .then(late => late.close())
            .catch(closeErr =>
              logWarn(`[Capabilities] Late session from ${source.name} did not close`, {
                error: getErrorMessage(closeErr),
              }),
            );
        }
      }
    }

    return {
      capabilities: sessions.flatMap(session => session.capabilities),
      sources: answered,
      close: async () => {
        for (const session of sessions) {
          try {
            await session.close();
          } catch (err) {
            logWarn("[Capabilities] Failed to close session", { error: getErrorMessage(err) });
          }
        }
      },
    };
  }
}
