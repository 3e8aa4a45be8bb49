import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  McpError,
  ReadResourceRequestSchema,
  type CallToolResult,
  type GetPromptResult,
  type Prompt,
  type Resource,
} from "@modelcontextprotocol/sdk/types.js";
import { ENDPOINTS } from "./endpoints-catalog.js";
import {
  errorMessage,
  notFound,
  type Result,
  type ToolError,
} from "./errors.js";
import type { ApiTransport } from "./linearb-client.js";
import { createLogger, type Logger } from "./logger.js";
import {
  METRIC_CATEGORY_INFO,
  SUPPORTED_METRICS,
} from "./metrics-catalog.js";
import { ACTIVE_TEAMS, TEAM_TYPE_INFO } from "./teams-catalog.js";
import { TOOL_REGISTRY, TOOLS } from "./tools.js";

export const SERVER_NAME = "linearb-mcp-server";
export const SERVER_VERSION = "1.0.0";

export interface CreateServerOptions {
  transport: ApiTransport;
  baseUrl: string;
  logger?: Logger;
}

type CatalogResource = Resource & {
  read(): unknown;
};

const catalogResources: readonly CatalogResource[] = [
  {
    uri: "linearb://catalog/metrics",
    name: "LinearB Metrics Catalog",
    description:
      "Every metric usable in post_metrics and export_metrics, " +
      "with categories and supported aggregations.",
    mimeType: "application/json",
    read: () => ({
      categories: METRIC_CATEGORY_INFO,
      metrics: SUPPORTED_METRICS,
    }),
  },
  {
    uri: "linearb://catalog/teams",
    name: "LinearB Teams Catalog",
    description: "Active teams with their type, comparability and focus areas.",
    mimeType: "application/json",
    read: () => ({ types: TEAM_TYPE_INFO, teams: ACTIVE_TEAMS }),
  },
  {
    uri: "linearb://catalog/endpoints",
    name: "LinearB Endpoints Catalog",
    description:
      "The read-only LinearB API endpoints this server calls, " +
      "with their parameters.",
    mimeType: "application/json",
    read: () => ({ endpoints: ENDPOINTS }),
  },
];

export const serverPrompt: Prompt = {
  name: "linearb-server-prompt",
  description: "Instructions for using the LinearB MCP server effectively",
};

const PROMPT_TEXT = `This server gives read-only access to LinearB, an engineering metrics platform. Use it to look up deployments, teams, users, services and incidents, and to query delivery metrics.

Discovery first:
- discover_api and get_api_categories list every endpoint and tool.
- get_endpoint_details describes the parameters of one endpoint.
- get_usage_examples returns example arguments for any tool.

Metrics workflow:
1. Find metric names with get_supported_metrics, get_metrics_by_category or search_metrics.
2. Check which metrics support an aggregation (p75, p50, avg); count metrics take none.
3. Call post_metrics with group_by, roll_up, requested_metrics and time_ranges (dates as YYYY-MM-DD).
4. Use export_metrics with file_format csv or json to get the same data as a file.

Teams:
- get_active_teams and get_teams_by_type list the team roster.
- Only compare engineering teams with each other (get_comparable_teams); analyze QA teams separately.

Errors come back as JSON with a kind: VALIDATION_ERROR means fix the arguments, NETWORK_ERROR may be retried, API_ERROR carries the HTTP status from LinearB.

No tool creates, updates or deletes anything.`;

export function renderResult(result: Result<unknown>): CallToolResult {
  if (!result.ok) return renderError(result.error);
  const text =
    typeof result.value === "string"
      ? result.value
      : JSON.stringify(result.value, null, 2);
  return { content: [{ type: "text", text }] };
}

export function renderError(error: ToolError): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error }, null, 2) }],
    isError: true,
  };
}

export function createServer(options: CreateServerOptions): Server {
  const logger = options.logger ?? createLogger("LinearB MCP");

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    {
      capabilities: {
        prompts: {},
        resources: {},
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOLS.map((tool) => tool.definition),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    const tool = TOOL_REGISTRY.get(name);
    if (!tool) {
      logger.warn(`Unknown tool requested: ${name}`);
      return renderError(
        notFound(`Unknown tool: ${name}`, [...TOOL_REGISTRY.keys()]),
      );
    }

    try {
      const result = await tool.run(args, {
        transport: options.transport,
        baseUrl: options.baseUrl,
        signal: extra.signal,
      });
      if (!result.ok) logger.debug(`${name} failed with ${result.error.kind}`);
      return renderResult(result);
    } catch (error) {
      logger.error(`Error executing tool ${name}:`, error);
      return renderError({
        kind: "UNKNOWN_ERROR",
        message: errorMessage(error),
      });
    }
  });

  server.setRequestHandler(ListResourcesRequestSchema, async () => ({
    resources: catalogResources.map(({ read: _read, ...resource }) => resource),
  }));

  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;
    const resource = catalogResources.find(
      (candidate) => candidate.uri === uri,
    );
    if (!resource) {
      throw new McpError(ErrorCode.InvalidParams, `Unknown resource: ${uri}`);
    }
    return {
      contents: [
        {
          uri,
          mimeType: "application/json",
          text: JSON.stringify(resource.read(), null, 2),
        },
      ],
    };
  });

  server.setRequestHandler(ListPromptsRequestSchema, async () => ({
    prompts: [serverPrompt],
  }));

  server.setRequestHandler(
    GetPromptRequestSchema,
    async (request): Promise<GetPromptResult> => {
      const { name } = request.params;
      if (name !== serverPrompt.name) {
        throw new McpError(
          ErrorCode.InvalidParams,
          `Prompt not found: ${name}`,
        );
      }
      return {
        description: serverPrompt.description,
        messages: [
          { role: "user", content: { type: "text", text: PROMPT_TEXT } },
        ],
      };
    },
  );

  return server;
}
