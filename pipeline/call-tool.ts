// pipeline/call-tool.ts — the one place a remote tool call can fail
import { normalize, type Normalized, type NormalizeOptions } from "../lib/normalize";
import { err, errorMessage, ok, type ProviderError, type Result } from "../lib/result";
import type { ToolArgs, ToolInvoker } from "../providers/types";

export async function callTool(
    invoker: ToolInvoker,
    tool: string,
    args: ToolArgs,
    options?: NormalizeOptions,
): Promise<Result<Normalized, ProviderError>> {
    try {
        const raw = await invoker.invoke(tool, args);
        return ok(normalize(raw, options));
    } catch (e) {
        return err({ kind: "provider", tool, message: errorMessage(e) });
    }
}
