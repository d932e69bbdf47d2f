/**
 * MCP server factory: one `Server` per client session, each with its own
 * document chat session and research agent. The embedding and generation
 * gateways are shared, stateless clients.
 *
 * Tool contracts:
 *  ingest_document        { path }                    → { source, fileType, pageCount?, chunks }
 *  ask_document           { question }                → { answer, sources, question }
 *  summarize_document     {}                          → summary text
 *  clear_document         {}                          → confirmation text
 *  supported_formats      {}                          → ["pdf", "docx", "doc", "txt"]
 *  research               { query, maxIterations? }   → ResearchResult
 *  list_research_tools    {}                          → [{ name, description }]
 *  clear_research_memory  {}                          → confirmation text
 *
 * Errors: usage problems surface as InvalidRequest / InvalidParams, gateway
 * failures as InternalError, unknown tools as MethodNotFound.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import path from "node:path";
import { z } from "zod";
import { ResearchAgent } from "./agent/research-agent";
import { APP_VERSION } from "./config";
import type { EmbeddingGateway } from "./embeddings";
import {
  ConfigError,
  DocumentParseError,
  EmbeddingError,
  EmptyDocumentError,
  GatewayError,
  NotReadyError,
  UnsupportedFormatError,
} from "./errors";
import type { GenerationGateway } from "./generation";
import { DocumentChatSession } from "./rag/document-chat";
import { loadDocumentFile } from "./rag/document-loader";
import { statusManager } from "./status";
import { createDefaultToolRegistry } from "./tools/registry";

export interface ServerDeps {
  embeddings: EmbeddingGateway;
  generation: GenerationGateway;
  /** Directory ingest_document paths resolve against. */
  docsRoot: string;
  chunkSize?: number;
  chunkOverlap?: number;
  topK?: number;
  maxIterations?: number;
  verbose?: boolean;
  /** Clock for the date/time tool. */
  now?: () => Date;
}

export const SERVER_NAME = "doc-research-mcp";

/**
 * Resolve `relPath` under `root`, refusing anything that escapes it
 * (`..` segments, absolute paths elsewhere).
 */
export function ensureWithinRoot(root: string, relPath: string): string {
  const abs = path.resolve(root, relPath);
  const normRoot = path.resolve(root) + path.sep;
  if (!abs.startsWith(normRoot)) throw new McpError(ErrorCode.InvalidRequest, "Path outside DOCS_ROOT");
  return abs;
}

const IngestArgs = z.object({ path: z.string().min(1) });
const AskArgs = z.object({ question: z.string().trim().min(1) });
const ResearchArgs = z.object({
  query: z.string().trim().min(1),
  maxIterations: z.number().int().min(1).max(20).optional(),
});

function parseArgs<T>(schema: z.ZodType<T>, raw: unknown): T {
  const parsed = schema.safeParse(raw ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "arguments"}: ${i.message}`).join("; ");
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${detail}`);
  }
  return parsed.data;
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/** Translate domain errors to MCP error codes; anything unrecognised is rethrown as-is. */
export function toMcpError(e: unknown): unknown {
  if (e instanceof McpError) return e;
  if (
    e instanceof NotReadyError ||
    e instanceof UnsupportedFormatError ||
    e instanceof DocumentParseError ||
    e instanceof EmptyDocumentError
  ) {
    return new McpError(ErrorCode.InvalidRequest, e.message);
  }
  if (isMissingFile(e)) return new McpError(ErrorCode.InvalidRequest, "File not found");
  if (e instanceof ConfigError) return new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof EmbeddingError || e instanceof GatewayError) {
    return new McpError(ErrorCode.InternalError, `${e.name}: ${e.message}`);
  }
  return e;
}

function text(value: string): CallToolResult {
  return { content: [{ type: "text", text: value }] };
}

function json(value: unknown): CallToolResult {
  return text(JSON.stringify(value, null, 2));
}

const NO_ARGS: Tool["inputSchema"] = { type: "object", properties: {} };

export const TOOLS: Tool[] = [
  {
    name: "ingest_document",
    description:
      "Load a PDF, DOCX, DOC or TXT file under DOCS_ROOT into this session, replacing any previous document and clearing the conversation. Returns the chunk count.",
    inputSchema: {
      type: "object",
      properties: {
        path: { type: "string", description: "File path relative to DOCS_ROOT (use forward slashes)." },
      },
      required: ["path"],
    },
  },
  {
    name: "ask_document",
    description:
      "Ask a question about the ingested document. Answers from the most relevant passages, taking earlier questions in this session into account, and returns source previews.",
    inputSchema: {
      type: "object",
      properties: {
        question: { type: "string", description: "Natural language question about the document." },
      },
      required: ["question"],
    },
  },
  {
    name: "summarize_document",
    description: "Short summary of the ingested document.",
    inputSchema: NO_ARGS,
  },
  {
    name: "clear_document",
    description: "Drop the ingested document and the document conversation.",
    inputSchema: NO_ARGS,
  },
  {
    name: "supported_formats",
    description: "File types ingest_document accepts.",
    inputSchema: NO_ARGS,
  },
  {
    name: "research",
    description:
      "Answer a research question with a tool-using agent (calculator, text analyzer, date/time). Returns the answer, the tools involved and the reasoning trace.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "The research question or task." },
        maxIterations: {
          type: "number",
          description: "Maximum reasoning steps before the agent must answer (1-20).",
          minimum: 1,
          maximum: 20,
        },
      },
      required: ["query"],
    },
  },
  {
    name: "list_research_tools",
    description: "Names and descriptions of the research agent's tools.",
    inputSchema: NO_ARGS,
  },
  {
    name: "clear_research_memory",
    description: "Forget earlier research questions and answers in this session.",
    inputSchema: NO_ARGS,
  },
];

/**
 * Build a fresh, unconnected MCP server whose tools operate on a new
 * per-session workspace.
 */
export function createServer(deps: ServerDeps): Server {
  const session = new DocumentChatSession({
    embeddings: deps.embeddings,
    generation: deps.generation,
    chunkSize: deps.chunkSize,
    chunkOverlap: deps.chunkOverlap,
    topK: deps.topK,
    verbose: deps.verbose,
  });
  const agent = new ResearchAgent({
    generation: deps.generation,
    tools: createDefaultToolRegistry(deps.now),
    maxIterations: deps.maxIterations,
    verbose: deps.verbose,
  });

  const server = new Server({ name: SERVER_NAME, version: APP_VERSION }, { capabilities: { tools: {} } });
  statusManager.sessionOpened();
  server.onclose = () => statusManager.sessionClosed();

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (req): Promise<CallToolResult> => {
    const args = req.params.arguments;
    try {
      switch (req.params.name) {
        case "ingest_document": {
          const { path: rel } = parseArgs(IngestArgs, args);
          const abs = ensureWithinRoot(deps.docsRoot, rel);
          const doc = await loadDocumentFile(abs);
          const chunks = await session.ingest(doc.text, doc.metadata);
          return json({ ...doc.metadata, chunks });
        }
        case "ask_document": {
          const { question } = parseArgs(AskArgs, args);
          return json(await session.ask(question));
        }
        case "summarize_document":
          return text(await session.summarize());
        case "clear_document":
          await session.clear();
          return text("Document and conversation cleared.");
        case "supported_formats":
          return json(session.getSupportedFormats());
        case "research": {
          const { query, maxIterations } = parseArgs(ResearchArgs, args);
          return json(await agent.research(query, { maxIterations }));
        }
        case "list_research_tools":
          return json(agent.getAvailableTools());
        case "clear_research_memory":
          await agent.clearMemory();
          return text("Research memory cleared.");
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${req.params.name}`);
      }
    } catch (e) {
      throw toMcpError(e);
    }
  });

  return server;
}
