import { deepFreeze } from "./freeze.js";
import type { HttpMethod } from "./linearb-client.js";

export const ENDPOINT_CATEGORIES = [
  "deployments",
  "teams",
  "users",
  "services",
  "incidents",
  "metrics",
  "health",
] as const;

export type EndpointCategory = (typeof ENDPOINT_CATEGORIES)[number];

export type ParameterLocation = "query" | "path" | "body";

export interface ParameterSpec {
  name: string;
  in: ParameterLocation;
  required: boolean;
  type: "string" | "integer" | "boolean" | "array" | "object";
  description: string;
  default?: string | number | boolean;
  enum?: readonly string[];
  minimum?: number;
  maximum?: number;
  /** JSON Schema of the elements, for array parameters. */
  items?: Readonly<Record<string, unknown>>;
}

export interface EndpointDescriptor {
  path: string;
  method: HttpMethod;
  category: EndpointCategory;
  /** Name of the tool that calls this endpoint. */
  toolName: string;
  summary: string;
  description: string;
  parameters: readonly ParameterSpec[];
  example?: Readonly<Record<string, unknown>>;
}

export const CATEGORY_DESCRIPTIONS: Readonly<
  Record<EndpointCategory, string>
> = deepFreeze({
  deployments: "View deployment information (read-only)",
  teams: "View team information using the V2 API (read-only)",
  users: "View user information (read-only)",
  services: "Retrieve service information",
  incidents: "View incident information (read-only)",
  metrics: "Query and export metrics data (read-only)",
  health: "Monitor API health",
});

const pagination = (
  maxPageSize: number,
  defaultPageSize: number,
): ParameterSpec[] => [
  {
    name: "offset",
    in: "query",
    required: false,
    type: "integer",
    description: "Number of results to skip",
    default: 0,
    minimum: 0,
  },
  {
    name: "page_size",
    in: "query",
    required: false,
    type: "integer",
    description: "Number of results per page",
    default: defaultPageSize,
    minimum: 1,
    maximum: maxPageSize,
  },
];

const measurementBody: ParameterSpec[] = [
  {
    name: "group_by",
    in: "body",
    required: true,
    type: "string",
    description: "Grouping level of the returned measurements",
    enum: ["organization", "contributor", "team", "repository", "label"],
  },
  {
    name: "roll_up",
    in: "body",
    required: true,
    type: "string",
    description: "Time aggregation bucket",
    enum: ["1d", "1w", "1mo", "custom"],
  },
  {
    name: "requested_metrics",
    in: "body",
    required: true,
    type: "array",
    description:
      "Metrics to query, each { name, agg? } (see get_supported_metrics)",
    items: {
      type: "object",
      properties: {
        name: {
          type: "string",
          description: "Metric name, e.g. branch.computed.cycle_time",
        },
        agg: {
          type: "string",
          enum: ["p75", "p50", "avg"],
          description: "Aggregation, where supported",
        },
      },
      required: ["name"],
    },
  },
  {
    name: "time_ranges",
    in: "body",
    required: true,
    type: "array",
    description: "Time ranges to query, each { after, before } as YYYY-MM-DD",
    items: {
      type: "object",
      properties: {
        after: { type: "string", description: "Start date (YYYY-MM-DD)" },
        before: { type: "string", description: "End date (YYYY-MM-DD)" },
      },
      required: ["after", "before"],
    },
  },
  {
    name: "repository_ids",
    in: "body",
    required: false,
    type: "array",
    description: "Repository IDs to filter by",
    items: { type: "integer", minimum: 1 },
  },
  {
    name: "team_ids",
    in: "body",
    required: false,
    type: "array",
    description: "Team IDs to filter by",
    items: { type: "integer", minimum: 1 },
  },
];

const measurementExample = {
  group_by: "team",
  roll_up: "1w",
  requested_metrics: [{ name: "branch.computed.cycle_time", agg: "p75" }],
  time_ranges: [{ after: "2024-01-01", before: "2024-01-31" }],
};

export const ENDPOINTS: readonly EndpointDescriptor[] = deepFreeze([
  {
    path: "/api/v1/deployments",
    method: "GET",
    category: "deployments",
    toolName: "list_deployments",
    summary: "List deployments",
    description:
      "List deployments with optional repository, date range, stage and commit filters.",
    parameters: [
      {
        name: "repository_id",
        in: "query",
        required: false,
        type: "integer",
        description: "Filter by repository ID",
        minimum: 1,
      },
      {
        name: "after",
        in: "query",
        required: false,
        type: "string",
        description:
          "Only deployments published after this date or timestamp (ISO 8601)",
      },
      {
        name: "before",
        in: "query",
        required: false,
        type: "string",
        description:
          "Only deployments published before this date or timestamp (ISO 8601)",
      },
      {
        name: "limit",
        in: "query",
        required: false,
        type: "integer",
        description: "Maximum number of results",
        default: 10,
        minimum: 1,
        maximum: 100,
      },
      {
        name: "offset",
        in: "query",
        required: false,
        type: "integer",
        description: "Number of results to skip",
        default: 0,
        minimum: 0,
      },
      {
        name: "stage",
        in: "query",
        required: false,
        type: "string",
        description: "Filter by deployment stage",
      },
      {
        name: "sort_by",
        in: "query",
        required: false,
        type: "string",
        description: "Sort field",
        default: "published_at",
      },
      {
        name: "sort_dir",
        in: "query",
        required: false,
        type: "string",
        description: "Sort direction",
        default: "desc",
        enum: ["asc", "desc"],
      },
      {
        name: "commit_sha",
        in: "query",
        required: false,
        type: "string",
        description: "Filter by commit SHA",
      },
    ],
    example: { limit: 10, sort_dir: "desc" },
  },
  {
    path: "/api/v2/teams",
    method: "GET",
    category: "teams",
    toolName: "search_teams_v2",
    summary: "Search teams",
    description: "Search teams with pagination using the V2 API.",
    parameters: [
      ...pagination(50, 50),
      {
        name: "search_term",
        in: "query",
        required: false,
        type: "string",
        description:
          "Filter teams by name (1-100 characters; blank means no filter)",
      },
      {
        name: "nonmerged_members_only",
        in: "query",
        required: false,
        type: "boolean",
        description: "Return only contributors without parent contributors",
        default: false,
      },
    ],
    example: { search_term: "backend", page_size: 20 },
  },
  {
    path: "/api/v1/users",
    method: "GET",
    category: "users",
    toolName: "search_users",
    summary: "Search users",
    description: "Search users with pagination, role filtering and ordering.",
    parameters: [
      ...pagination(50, 50),
      {
        name: "order_by",
        in: "query",
        required: false,
        type: "string",
        description: "Field to order by",
        enum: ["name", "email"],
      },
      {
        name: "order_dir",
        in: "query",
        required: false,
        type: "string",
        description: "Order direction",
        enum: ["ASC", "DESC"],
      },
      {
        name: "search_by_field",
        in: "query",
        required: false,
        type: "string",
        description: "Field the search term applies to",
        enum: ["name", "email"],
      },
      {
        name: "search_term",
        in: "query",
        required: false,
        type: "string",
        description: "Search term (1-100 characters; blank means no filter)",
      },
      {
        name: "user_role",
        in: "query",
        required: false,
        type: "string",
        description: "Filter by role",
        enum: ["admin", "editor", "viewer", "external", "basic"],
      },
      {
        name: "include_user_children",
        in: "query",
        required: false,
        type: "boolean",
        description: "Include merged child users",
        default: false,
      },
    ],
    example: { search_by_field: "name", search_term: "alex", order_by: "name" },
  },
  {
    path: "/api/v1/services/",
    method: "GET",
    category: "services",
    toolName: "get_services",
    summary: "List services",
    description: "Get all services, optionally filtered by repository.",
    parameters: [
      {
        name: "repository_id",
        in: "query",
        required: false,
        type: "integer",
        description: "Filter services by repository ID",
        minimum: 1,
      },
    ],
  },
  {
    path: "/api/v1/services/{service_id}",
    method: "GET",
    category: "services",
    toolName: "get_service",
    summary: "Get service",
    description: "Get a specific service by ID.",
    parameters: [
      {
        name: "service_id",
        in: "path",
        required: true,
        type: "integer",
        description: "Service ID",
        minimum: 1,
      },
    ],
    example: { service_id: 42 },
  },
  {
    path: "/api/v1/incidents/{provider_id}",
    method: "GET",
    category: "incidents",
    toolName: "get_incident",
    summary: "Get incident",
    description: "Get a specific incident by its provider ID.",
    parameters: [
      {
        name: "provider_id",
        in: "path",
        required: true,
        type: "string",
        description: "Incident provider ID",
      },
    ],
    example: { provider_id: "INC-001" },
  },
  {
    path: "/api/v1/incidents/search",
    method: "POST",
    category: "incidents",
    toolName: "search_incidents",
    summary: "Search incidents",
    description: "Search incidents by status, severity and date range.",
    parameters: [
      {
        name: "limit",
        in: "body",
        required: false,
        type: "integer",
        description: "Maximum number of results",
        default: 10,
        minimum: 1,
        maximum: 100,
      },
      {
        name: "offset",
        in: "body",
        required: false,
        type: "integer",
        description: "Number of results to skip",
        default: 0,
        minimum: 0,
      },
      {
        name: "status",
        in: "body",
        required: false,
        type: "string",
        description: "Filter by incident status",
      },
      {
        name: "severity",
        in: "body",
        required: false,
        type: "string",
        description: "Filter by incident severity",
      },
      {
        name: "after",
        in: "body",
        required: false,
        type: "string",
        description: "Only incidents after this date or timestamp (ISO 8601)",
      },
      {
        name: "before",
        in: "body",
        required: false,
        type: "string",
        description: "Only incidents before this date or timestamp (ISO 8601)",
      },
    ],
    example: { limit: 20, after: "2024-01-01" },
  },
  {
    path: "/api/v2/measurements",
    method: "POST",
    category: "metrics",
    toolName: "post_metrics",
    summary: "Query measurements",
    description:
      "Query metrics grouped by organization, team, repository or contributor.",
    parameters: measurementBody,
    example: measurementExample,
  },
  {
    path: "/api/v2/measurements/export",
    method: "POST",
    category: "metrics",
    toolName: "export_metrics",
    summary: "Export measurements",
    description: "Export a measurements query as CSV or JSON.",
    parameters: [
      {
        name: "file_format",
        in: "query",
        required: false,
        type: "string",
        description: "Export format",
        default: "csv",
        enum: ["csv", "json"],
      },
      ...measurementBody,
    ],
    example: { ...measurementExample, file_format: "csv" },
  },
  {
    path: "/api/v1/health",
    method: "GET",
    category: "health",
    toolName: "health_check",
    summary: "Health check",
    description: "Check the health status of the LinearB API.",
    parameters: [],
  },
] satisfies EndpointDescriptor[]);
