// providers/mcp.ts — ToolInvoker backed by a Model Context Protocol server
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { RawResult } from "../lib/normalize";
import type { ToolArgs, ToolInvoker } from "./types";

export type McpTransportKind = "http" | "sse";

/** Servers mounted at `/sse` speak the older SSE transport. */
export const transportFor = (url: string): McpTransportKind =>
    new URL(url).pathname.replace(/\/+$/, "").endsWith("/sse") ? "sse" : "http";

export class McpToolInvoker implements ToolInvoker {
    private constructor(
        private readonly client: Client,
        readonly url: string,
        private readonly timeoutMs: number,
    ) {}

    static async connect(url: string, opts: { kind?: McpTransportKind; timeoutMs?: number } = {}): Promise<McpToolInvoker> {
        const endpoint = new URL(url);
        const kind = opts.kind ?? transportFor(url);
        const client = new Client({ name: "cheap-trip-finder", version: "0.1.0" });
        const transport =
            kind === "sse" ? new SSEClientTransport(endpoint) : new StreamableHTTPClientTransport(endpoint);
        await client.connect(transport);
        return new McpToolInvoker(client, url, opts.timeoutMs ?? 60_000);
    }

    async invoke(toolName: string, args: ToolArgs): Promise<RawResult> {
        const result = await this.client.callTool({ name: toolName, arguments: args }, undefined, {
            timeout: this.timeoutMs,
        });
        return {
            structuredContent: "structuredContent" in result ? result.structuredContent : undefined,
            content: "content" in result && Array.isArray(result.content) ? result.content : undefined,
        };
    }

    async close(): Promise<void> {
        await this.client.close();
    }
}
