/**
 * Tool registry: every tool the server exposes, as an MCP definition plus
 * the function that runs it. Only read operations are registered; the
 * LinearB write endpoints (creating deployments, incidents, teams, users,
 * custom metrics) have no tool and no handler.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import {
  discoverApi,
  getActiveTeams,
  getApiCategories,
  getComparableTeams,
  getEndpointDetails,
  getExcludedTeams,
  getMetricCategoriesOverview,
  getMetricExamples,
  getMetricsByCategory,
  getSupportedMetrics,
  getTeamsByType,
  getUsageExamples,
  searchMetrics,
  searchTeamsByFocus,
} from "./discovery.js";
import {
  ENDPOINT_CATEGORIES,
  ENDPOINTS,
  type EndpointDescriptor,
} from "./endpoints-catalog.js";
import { ok, parseArgs, type Result } from "./errors.js";
import {
  exportMetrics,
  getIncident,
  getService,
  getServices,
  healthCheck,
  listDeployments,
  postMetrics,
  searchIncidents,
  searchTeamsV2,
  searchUsers,
  type DomainHandler,
  type HandlerContext,
} from "./handlers.js";
import { METRIC_CATEGORIES, METRIC_CATEGORY_INFO } from "./metrics-catalog.js";
import { TEAM_TYPE_INFO, TEAM_TYPES } from "./teams-catalog.js";

export interface ToolContext extends HandlerContext {
  baseUrl: string;
}

export interface ToolRegistration {
  definition: Tool;
  run(args: unknown, context: ToolContext): Promise<Result<unknown>>;
}

const READ_ONLY_LOCAL = {
  readOnlyHint: true,
  destructiveHint: false,
  idempotentHint: true,
  openWorldHint: false,
};

const READ_ONLY_REMOTE = { ...READ_ONLY_LOCAL, openWorldHint: true };

// --- Discovery tools (served from the static catalogs) ---

const discoverApiTool: Tool = {
  name: "discover_api",
  description:
    "Returns an overview of the LinearB API: base URL, every available (read-only) endpoint with its parameters, and endpoints grouped by category. Optionally restrict to one category.",
  inputSchema: {
    type: "object",
    properties: {
      category: {
        type: "string",
        enum: [...ENDPOINT_CATEGORIES],
        description: "Only include endpoints of this category",
      },
    },
  },
  annotations: READ_ONLY_LOCAL,
};

const getEndpointDetailsTool: Tool = {
  name: "get_endpoint_details",
  description:
    "Returns the full description of one API endpoint: parameters with types, defaults and constraints, an example payload, and the tool that calls it.",
  inputSchema: {
    type: "object",
    properties: {
      endpoint_path: {
        type: "string",
        description: "Endpoint path, e.g. '/api/v1/deployments'",
      },
      method: {
        type: "string",
        description: "HTTP method (default: GET)",
      },
    },
    required: ["endpoint_path"],
  },
  annotations: READ_ONLY_LOCAL,
};

const getApiCategoriesTool: Tool = {
  name: "get_api_categories",
  description:
    "Lists all tools organized by functional category (deployments, teams, users, services, incidents, metrics, health, discovery).",
  inputSchema: { type: "object", properties: {} },
  annotations: READ_ONLY_LOCAL,
};

const getUsageExamplesTool: Tool = {
  name: "get_usage_examples",
  description:
    "Returns example arguments for the tools. Filter by category or by a single tool name.",
  inputSchema: {
    type: "object",
    properties: {
      category: {
        type: "string",
        description:
          "Example category, e.g. 'deployments' or 'metrics_discovery'",
      },
      tool_name: {
        type: "string",
        description: "Return examples for this tool only",
      },
    },
  },
  annotations: READ_ONLY_LOCAL,
};

const getSupportedMetricsTool: Tool = {
  name: "get_supported_metrics",
  description:
    "Returns every metric LinearB supports in measurement queries with its category, description, units and supported aggregations (p75, p50, avg).",
  inputSchema: { type: "object", properties: {} },
  annotations: READ_ONLY_LOCAL,
};

const getMetricsByCategoryTool: Tool = {
  name: "get_metrics_by_category",
  description:
    "Returns the metrics of one category, or an overview of all categories when no category is given.",
  inputSchema: {
    type: "object",
    properties: {
      category: {
        type: "string",
        enum: [...METRIC_CATEGORIES],
        description: "Metric category",
      },
    },
  },
  annotations: READ_ONLY_LOCAL,
};

const searchMetricsTool: Tool = {
  name: "search_metrics",
  description:
    "Searches metrics by name or description (case-insensitive substring). Optional filters by category and by aggregation support are combined with AND. An empty search term matches every metric.",
  inputSchema: {
    type: "object",
    properties: {
      search_term: {
        type: "string",
        description: "Text to look for in metric names and descriptions",
      },
      category: {
        type: "string",
        enum: [...METRIC_CATEGORIES],
        description: "Only metrics of this category",
      },
      has_aggregation: {
        type: "boolean",
        description:
          "true: only metrics supporting p75/p50/avg; " +
          "false: only metrics without aggregations",
      },
    },
    required: ["search_term"],
  },
  annotations: READ_ONLY_LOCAL,
};

const getMetricExamplesTool: Tool = {
  name: "get_metric_examples",
  description:
    "Returns ready-to-use post_metrics queries for common analyses, a guide to the aggregations and best practices.",
  inputSchema: { type: "object", properties: {} },
  annotations: READ_ONLY_LOCAL,
};

const getActiveTeamsTool: Tool = {
  name: "get_active_teams",
  description:
    "Returns the active teams with their type, comparability and focus areas. Engineering teams are comparable with each other; QA teams are analyzed separately.",
  inputSchema: {
    type: "object",
    properties: {
      team_type: {
        type: "string",
        enum: [...TEAM_TYPES],
        description: "Only teams of this type",
      },
    },
  },
  annotations: READ_ONLY_LOCAL,
};

const getTeamsByTypeTool: Tool = {
  name: "get_teams_by_type",
  description:
    "Returns the teams of one type (engineering or qa), or an overview of both types when no type is given.",
  inputSchema: {
    type: "object",
    properties: {
      team_type: {
        type: "string",
        enum: [...TEAM_TYPES],
        description: "Team type",
      },
    },
  },
  annotations: READ_ONLY_LOCAL,
};

const getComparableTeamsTool: Tool = {
  name: "get_comparable_teams",
  description:
    "Returns the engineering teams whose metrics may be benchmarked against each other, and the teams excluded from comparison.",
  inputSchema: { type: "object", properties: {} },
  annotations: READ_ONLY_LOCAL,
};

const searchTeamsByFocusTool: Tool = {
  name: "search_teams_by_focus",
  description:
    "Searches teams by name, description, short code or focus area (case-insensitive substring), optionally restricted to a team type and to comparable teams.",
  inputSchema: {
    type: "object",
    properties: {
      search_term: { type: "string", description: "Text to look for" },
      team_type: {
        type: "string",
        enum: [...TEAM_TYPES],
        description: "Only teams of this type",
      },
      comparable_only: {
        type: "boolean",
        description: "Only comparable teams (default: false)",
      },
    },
    required: ["search_term"],
  },
  annotations: READ_ONLY_LOCAL,
};

const DiscoverApiArgsSchema = z.object({
  category: z.enum(ENDPOINT_CATEGORIES).optional(),
});

const GetEndpointDetailsArgsSchema = z.object({
  endpoint_path: z.string().trim().min(1),
  method: z.string().trim().min(1).default("GET"),
});

const GetUsageExamplesArgsSchema = z.object({
  category: z.string().trim().min(1).optional(),
  tool_name: z.string().trim().min(1).optional(),
});

const GetMetricsByCategoryArgsSchema = z.object({
  category: z.string().trim().min(1).optional(),
});

const SearchMetricsArgsSchema = z.object({
  search_term: z.string(),
  category: z.enum(METRIC_CATEGORIES).optional(),
  has_aggregation: z.boolean().optional(),
});

const TeamTypeArgsSchema = z.object({
  team_type: z.enum(TEAM_TYPES).optional(),
});

const SearchTeamsByFocusArgsSchema = z.object({
  search_term: z.string(),
  team_type: z.enum(TEAM_TYPES).optional(),
  comparable_only: z.boolean().default(false),
});

function localTool<S extends z.ZodTypeAny>(
  definition: Tool,
  schema: S,
  run: (args: z.output<S>, context: ToolContext) => Result<unknown>,
): ToolRegistration {
  return {
    definition,
    run: async (args, context) => {
      const parsed = parseArgs(schema, args);
      if (!parsed.ok) return parsed;
      return run(parsed.value, context);
    },
  };
}

const DISCOVERY_TOOLS: readonly ToolRegistration[] = [
  localTool(discoverApiTool, DiscoverApiArgsSchema, (args, { baseUrl }) =>
    ok(discoverApi(baseUrl, args.category)),
  ),
  localTool(getEndpointDetailsTool, GetEndpointDetailsArgsSchema, (args) =>
    getEndpointDetails(args.endpoint_path, args.method),
  ),
  localTool(getApiCategoriesTool, z.object({}), () =>
    ok(getApiCategories(DISCOVERY_TOOL_DEFINITIONS)),
  ),
  localTool(getUsageExamplesTool, GetUsageExamplesArgsSchema, (args) =>
    getUsageExamples({ category: args.category, toolName: args.tool_name }),
  ),
  localTool(getSupportedMetricsTool, z.object({}), () =>
    ok(getSupportedMetrics()),
  ),
  localTool(
    getMetricsByCategoryTool,
    GetMetricsByCategoryArgsSchema,
    (args) => {
      if (args.category === undefined) {
        return ok(getMetricCategoriesOverview());
      }
      const metrics = getMetricsByCategory(args.category);
      if (!metrics.ok) return metrics;
      const info = METRIC_CATEGORY_INFO.find(
        (candidate) => candidate.id === args.category,
      );
      return ok({
        ...info,
        totalMetrics: metrics.value.length,
        metrics: metrics.value,
      });
    },
  ),
  localTool(searchMetricsTool, SearchMetricsArgsSchema, (args) => {
    const metrics = searchMetrics(args.search_term, {
      category: args.category,
      hasAggregation: args.has_aggregation,
    });
    return ok({
      searchTerm: args.search_term.trim().toLowerCase(),
      filters: {
        category: args.category ?? null,
        hasAggregation: args.has_aggregation ?? null,
      },
      totalMatches: metrics.length,
      metrics,
    });
  }),
  localTool(getMetricExamplesTool, z.object({}), () =>
    ok(getMetricExamples()),
  ),
  localTool(getActiveTeamsTool, TeamTypeArgsSchema, (args) => {
    const teams = getActiveTeams(args.team_type);
    return ok({
      totalTeams: teams.length,
      teamTypes: TEAM_TYPE_INFO,
      teams,
      usageNote:
        "Use team names in metrics queries. Engineering teams are " +
        "comparable; QA teams should be analyzed separately.",
    });
  }),
  localTool(getTeamsByTypeTool, TeamTypeArgsSchema, (args) =>
    ok(getTeamsByType(args.team_type)),
  ),
  localTool(getComparableTeamsTool, z.object({}), () => {
    const teams = getComparableTeams();
    return ok({
      totalComparableTeams: teams.length,
      teams,
      excludedTeams: getExcludedTeams(),
      usageNote:
        "These teams can be compared in metrics analysis. " +
        "QA teams are tracked separately.",
    });
  }),
  localTool(searchTeamsByFocusTool, SearchTeamsByFocusArgsSchema, (args) => {
    const teams = searchTeamsByFocus(args.search_term, {
      teamType: args.team_type,
      comparableOnly: args.comparable_only,
    });
    return ok({
      searchTerm: args.search_term.trim().toLowerCase(),
      filters: {
        teamType: args.team_type ?? null,
        comparableOnly: args.comparable_only,
      },
      totalMatches: teams.length,
      teams,
    });
  }),
];

const DISCOVERY_TOOL_DEFINITIONS = DISCOVERY_TOOLS.map(
  ({ definition }) => definition,
);

// --- API tools (forwarded to LinearB) ---

const DOMAIN_HANDLERS: Readonly<Record<string, DomainHandler>> = {
  list_deployments: listDeployments,
  search_teams_v2: searchTeamsV2,
  search_users: searchUsers,
  get_services: getServices,
  get_service: getService,
  get_incident: getIncident,
  search_incidents: searchIncidents,
  post_metrics: postMetrics,
  export_metrics: exportMetrics,
  health_check: healthCheck,
};

/** Input schema of an API tool, derived from the endpoint catalog entry. */
function inputSchemaFor(endpoint: EndpointDescriptor): Tool["inputSchema"] {
  const properties: Record<string, Record<string, unknown>> = {};
  for (const parameter of endpoint.parameters) {
    const { name, in: _location, required: _required, ...schema } = parameter;
    properties[name] = { ...schema };
  }
  const required = endpoint.parameters
    .filter((parameter) => parameter.required)
    .map((parameter) => parameter.name);
  return required.length > 0
    ? { type: "object", properties, required }
    : { type: "object", properties };
}

function apiTool(endpoint: EndpointDescriptor): ToolRegistration {
  const handler = DOMAIN_HANDLERS[endpoint.toolName];
  if (!handler) {
    throw new Error(`No handler registered for ${endpoint.toolName}`);
  }
  return {
    definition: {
      name: endpoint.toolName,
      description:
        `${endpoint.description} ` +
        `Calls ${endpoint.method} ${endpoint.path}.`,
      inputSchema: inputSchemaFor(endpoint),
      annotations: READ_ONLY_REMOTE,
    },
    run: (args, context) => handler(args, context),
  };
}

const API_TOOLS: readonly ToolRegistration[] = ENDPOINTS.map(apiTool);

export const TOOLS: readonly ToolRegistration[] = [
  ...DISCOVERY_TOOLS,
  ...API_TOOLS,
];

export const TOOL_REGISTRY: ReadonlyMap<string, ToolRegistration> = new Map(
  TOOLS.map((tool): [string, ToolRegistration] => [
    tool.definition.name,
    tool,
  ]),
);
