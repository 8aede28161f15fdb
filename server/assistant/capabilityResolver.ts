/**
 * Capability Resolver
 *
 * Picks the remote operation that should satisfy an intent from the set
 * discovered for the current turn. Remote tool names are not known ahead of
 * time, so matching is by name shape through an ordered strategy table:
 * the first strategy with any match wins, and within a strategy the
 * alphabetically first name is taken so the choice is deterministic.
 *
 * No match means no remote attempt; the caller uses the local provider.
 */

import { Intent, type Capability } from "./types";

export type CapabilityStrategy = {
  description: string;
  matches: (name: string, tokens: ReadonlySet<string>) => boolean;
};

export type CapabilityResolution = {
  capability: Capability;
  strategy: string;
};

const CREATION_VERBS = ["create", "add", "new", "insert", "post"];
const ITEM_NOUNS = ["page", "pages", "todo", "todos", "task", "tasks", "item", "items"];

// A creation verb next to any of these targets something other than a new item
const EXCLUDED_MODIFIERS = [
  "comment", "comments",
  "update", "patch", "delete", "archive", "remove",
  "database", "databases",
  "block", "blocks",
  "property", "properties",
  "query", "search", "retrieve", "get", "list",
];

// Names seen on workspace servers that the shape rules above do not catch
const KNOWN_CREATE_ITEM_ALIASES = [
  "create_database_item",
  "add_database_row",
  "append_row",
  "quick_capture",
];

/**
 * "API-post-page" and "APIPostPage" → ["api", "post", "page"], "createTodoItem" → ["create", "todo", "item"]
 */
export function tokenizeCapabilityName(name: string): string[] {
  return name
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(Boolean);
}

const hasAny = (tokens: ReadonlySet<string>, candidates: readonly string[]) =>
  candidates.some(candidate => tokens.has(candidate));

const CREATE_TASK_STRATEGIES: CapabilityStrategy[] = [
  {
    description: "canonical page-creation name",
    matches: name => /^(?:api[-_])?post[-_]page$/i.test(name),
  },
  {
    description: "creation verb with an item noun and no excluded modifier",
    matches: (_name, tokens) =>
      hasAny(tokens, CREATION_VERBS) &&
      hasAny(tokens, ITEM_NOUNS) &&
      !hasAny(tokens, EXCLUDED_MODIFIERS),
  },
  {
    description: "known alias",
    matches: name => KNOWN_CREATE_ITEM_ALIASES.includes(name.toLowerCase()),
  },
];

export const CAPABILITY_STRATEGIES: Record<Intent, CapabilityStrategy[]> = {
  [Intent.CREATE_TASK]: CREATE_TASK_STRATEGIES,
  // Events always go to the calendar provider; questions to retrieval
  [Intent.CREATE_EVENT]: [],
  [Intent.ANSWER_QUESTION]: [],
};

export function resolveCapability(
  intent: Intent,
  capabilities: readonly Capability[],
): CapabilityResolution | null {
  const candidates = capabilities
    .map(capability => ({ capability, tokens: new Set(tokenizeCapabilityName(capability.name)) }))
    .sort((a, b) => a.capability.name.localeCompare(b.capability.name));

  for (const strategy of CAPABILITY_STRATEGIES[intent]) {
    const match = candidates.find(({ capability, tokens }) => strategy.matches(capability.name, tokens));
    if (match) {
      return { capability: match.capability, strategy: strategy.description };
    }
  }
  return null;
}
