/**
 * Remote workspace capability source.
 *
 * Each turn starts the workspace's MCP tool server in a throwaway container
 * (`docker run --rm -i -e OPENAPI_MCP_HEADERS <image>`), talks to it over
 * stdio, lists its tools and exposes every tool as a Capability. Closing the
 * session stops the container.
 */

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport, getDefaultEnvironment } from "@modelcontextprotocol/sdk/client/stdio.js";
import { z } from "zod";
import type { WorkspaceConfig } from "../config/env";
import type { Capability, RemoteEnvelope } from "../assistant/types";
import { logDebug, logWarn } from "../utils/logger";
import type { CapabilitySession, CapabilitySource } from "./types";

const WORKSPACE_API_VERSION = "2022-06-28";
const CLIENT_INFO = { name: "turn-router", version: "0.1.0" };

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).optional(),
  isError: z.boolean().optional(),
}).passthrough();

const errorBodySchema = z.object({
  object: z.literal("error"),
  message: z.string().optional(),
  code: z.string().optional(),
}).passthrough();

const successBodySchema = z.object({ url: z.string().optional() }).passthrough();

export function buildWorkspaceHeaders(token: string): string {
  return JSON.stringify({
    Authorization: `Bearer ${token}`,
    "Notion-Version": WORKSPACE_API_VERSION,
  });
}

export function tokenPreview(token: string): string {
  return `${token.slice(0, 10)}...`;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Classifies a raw tool result. `isError` results and `{"object":"error"}`
 * bodies are failures carrying the provider's message; anything else is a
 * success, with the page url lifted out when the body has one.
 */
export function toRemoteEnvelope(result: unknown): RemoteEnvelope {
  const parsed = toolResultSchema.safeParse(result);
  if (!parsed.success) {
    return { ok: false, message: "Malformed tool result" };
  }

  const text = (parsed.data.content ?? [])
    .map(part => part.text ?? "")
    .filter(Boolean)
    .join("\n");
  const body = parseJson(text);

  const errorBody = errorBodySchema.safeParse(body);
  if (errorBody.success) {
    return { ok: false, message: errorBody.data.message ?? errorBody.data.code ?? text };
  }
  if (parsed.data.isError) {
    return { ok: false, message: text || "Tool reported an error" };
  }

  const successBody = successBodySchema.safeParse(body);
  return {
    ok: true,
    url: successBody.success ? successBody.data.url : undefined,
    data: body ?? text,
  };
}

export class McpWorkspaceSource implements CapabilitySource {
  readonly name = "workspace";

  constructor(private readonly config: WorkspaceConfig) {
    const token = config.integrationToken;
    if (!(token.startsWith("secret_") || token.startsWith("ntn_"))) {
      logWarn("[Workspace] Integration token does not start with 'secret_' or 'ntn_'; it may be malformed", {
        tokenPreview: tokenPreview(token),
      });
    }
  }

  async open(): Promise<CapabilitySession> {
    const transport = new StdioClientTransport({
      command: "docker",
      args: ["run", "--rm", "-i", "-e", "OPENAPI_MCP_HEADERS", this.config.image],
      env: {
        ...getDefaultEnvironment(),
        OPENAPI_MCP_HEADERS: buildWorkspaceHeaders(this.config.integrationToken),
      },
    });
    const client = new Client(CLIENT_INFO, { capabilities: {} });

    logDebug("[Workspace] Starting tool server", {
      image: this.config.image,
      tokenPreview: tokenPreview(this.config.integrationToken),
    });
    await client.connect(transport);

    try {
      const { tools } = await client.listTools();
      logDebug("[Workspace] Tools discovered", { tools: tools.map(t => t.name) });

      const capabilities: Capability[] = tools.map(tool => ({
        name: tool.name,
        description: tool.description,
        invoke: async (args: Record<string, unknown>) =>
          toRemoteEnvelope(await client.callTool({ name: tool.name, arguments: args })),
      }));

      return { capabilities, close: () => client.close() };
    } catch (err) {
      await client.close();
      throw err;
    }
  }
}
