import { z } from "zod";
import { parseArgs, type Result } from "./errors.js";
import type { ApiTransport, QueryValue } from "./linearb-client.js";
import { AGGREGATIONS, SUPPORTED_METRICS } from "./metrics-catalog.js";

export interface HandlerContext {
  transport: ApiTransport;
  signal?: AbortSignal;
}

export type DomainHandler = (
  args: unknown,
  context: HandlerContext,
) => Promise<Result<unknown>>;

// Zod schemas for tool argument validation

const DATE_MESSAGE = "Must be an ISO 8601 date (YYYY-MM-DD)";
const TIMESTAMP_MESSAGE =
  "Must be an ISO 8601 date or timestamp (e.g. 2024-01-31 or 2024-01-31T09:00:00Z)";

const calendarDate = z.string().date();
const timestamp = z.string().datetime({ offset: true });

const isoDate = z.string().trim().date(DATE_MESSAGE);

/** Filters that accept a bare date or a full timestamp with offset. */
const isoDateOrTimestamp = z
  .string()
  .trim()
  .refine(
    (value) =>
      calendarDate.safeParse(value).success ||
      timestamp.safeParse(value).success,
    { message: TIMESTAMP_MESSAGE },
  );

const positiveId = z.number().int().positive();
const offset = z.number().int().min(0).default(0);
const pageSize = z.number().int().min(1).max(50).default(50);
// A blank search term means no search filter.
const searchTerm = z.preprocess(
  (value) =>
    typeof value === "string" && value.trim() === "" ? undefined : value,
  z.string().trim().min(1).max(100).optional(),
);

function checkDateRange(
  value: { after?: string; before?: string },
  ctx: z.RefinementCtx,
) {
  if (
    value.after &&
    value.before &&
    Date.parse(value.after) > Date.parse(value.before)
  ) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["before"],
      message: "before must not be earlier than after",
    });
  }
}

export const ListDeploymentsArgsSchema = z
  .object({
    repository_id: positiveId.optional(),
    after: isoDateOrTimestamp.optional(),
    before: isoDateOrTimestamp.optional(),
    limit: z.number().int().min(1).max(100).default(10),
    offset,
    stage: z.string().trim().min(1).optional(),
    sort_by: z.string().trim().min(1).default("published_at"),
    sort_dir: z.enum(["asc", "desc"]).default("desc"),
    commit_sha: z.string().trim().min(1).optional(),
  })
  .superRefine(checkDateRange);

export const SearchTeamsArgsSchema = z.object({
  offset,
  page_size: pageSize,
  search_term: searchTerm,
  nonmerged_members_only: z.boolean().default(false),
});

export const SearchUsersArgsSchema = z.object({
  offset,
  page_size: pageSize,
  order_by: z.enum(["name", "email"]).optional(),
  order_dir: z.enum(["ASC", "DESC"]).optional(),
  search_by_field: z.enum(["name", "email"]).optional(),
  search_term: searchTerm,
  user_role: z
    .enum(["admin", "editor", "viewer", "external", "basic"])
    .optional(),
  include_user_children: z.boolean().default(false),
});

export const GetServicesArgsSchema = z.object({
  repository_id: positiveId.optional(),
});

export const GetServiceArgsSchema = z.object({
  service_id: positiveId,
});

export const GetIncidentArgsSchema = z.object({
  provider_id: z.string().trim().min(1, "provider_id cannot be empty"),
});

export const SearchIncidentsArgsSchema = z
  .object({
    limit: z.number().int().min(1).max(100).default(10),
    offset,
    status: z.string().trim().min(1).optional(),
    severity: z.string().trim().min(1).optional(),
    after: isoDateOrTimestamp.optional(),
    before: isoDateOrTimestamp.optional(),
  })
  .superRefine(checkDateRange);

const RequestedMetricSchema = z.object({
  name: z.string().trim().min(1),
  agg: z.enum(AGGREGATIONS).optional(),
});

const TimeRangeSchema = z
  .object({ after: isoDate, before: isoDate })
  .superRefine(checkDateRange);

const measurementFields = {
  group_by: z.enum([
    "organization",
    "contributor",
    "team",
    "repository",
    "label",
  ]),
  roll_up: z.enum(["1d", "1w", "1mo", "custom"]),
  requested_metrics: z
    .array(RequestedMetricSchema)
    .min(1, "requested_metrics cannot be empty"),
  time_ranges: z.array(TimeRangeSchema).min(1, "time_ranges cannot be empty"),
  repository_ids: z.array(positiveId).optional(),
  team_ids: z.array(positiveId).optional(),
};

/** An aggregation on a catalogued metric must be one the metric supports. */
function checkAggregations(
  value: { requested_metrics: Array<{ name: string; agg?: string }> },
  ctx: z.RefinementCtx,
) {
  value.requested_metrics.forEach((metric, index) => {
    if (!metric.agg) return;
    const known = SUPPORTED_METRICS.find(
      (candidate) => candidate.name === metric.name,
    );
    if (known && !known.aggregations.some((agg) => agg === metric.agg)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["requested_metrics", index, "agg"],
        message: `Metric '${metric.name}' does not support aggregation '${metric.agg}'`,
      });
    }
  });
}

export const PostMetricsArgsSchema = z
  .object(measurementFields)
  .superRefine(checkAggregations);

export const ExportMetricsArgsSchema = z
  .object({
    ...measurementFields,
    file_format: z.enum(["csv", "json"]).default("csv"),
  })
  .superRefine(checkAggregations);

export const HealthCheckArgsSchema = z.object({});

function withValidation<S extends z.ZodTypeAny>(
  schema: S,
  run: (args: z.output<S>, context: HandlerContext) => Promise<Result<unknown>>,
): DomainHandler {
  return async (args, context) => {
    const parsed = parseArgs(schema, args);
    if (!parsed.ok) return parsed;
    return run(parsed.value, context);
  };
}

function measurementBody(args: z.infer<typeof PostMetricsArgsSchema>) {
  return {
    group_by: args.group_by,
    roll_up: args.roll_up,
    requested_metrics: args.requested_metrics,
    time_ranges: args.time_ranges,
    ...(args.repository_ids?.length
      ? { repository_ids: args.repository_ids }
      : {}),
    ...(args.team_ids?.length ? { team_ids: args.team_ids } : {}),
  };
}

function withoutUndefined(
  value: Record<string, unknown>,
): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(value).filter(([, entry]) => entry !== undefined),
  );
}

export const listDeployments = withValidation(
  ListDeploymentsArgsSchema,
  (args, { transport, signal }) => {
    const query: Record<string, QueryValue> = { ...args };
    return transport.send("GET", "/api/v1/deployments", { query, signal });
  },
);

export const searchTeamsV2 = withValidation(
  SearchTeamsArgsSchema,
  (args, { transport, signal }) =>
    transport.send("GET", "/api/v2/teams", { query: { ...args }, signal }),
);

export const searchUsers = withValidation(
  SearchUsersArgsSchema,
  (args, { transport, signal }) =>
    transport.send("GET", "/api/v1/users", { query: { ...args }, signal }),
);

export const getServices = withValidation(
  GetServicesArgsSchema,
  (args, { transport, signal }) =>
    transport.send("GET", "/api/v1/services/", { query: { ...args }, signal }),
);

export const getService = withValidation(
  GetServiceArgsSchema,
  (args, { transport, signal }) =>
    transport.send("GET", `/api/v1/services/${args.service_id}`, { signal }),
);

export const getIncident = withValidation(
  GetIncidentArgsSchema,
  (args, { transport, signal }) =>
    transport.send(
      "GET",
      `/api/v1/incidents/${encodeURIComponent(args.provider_id)}`,
      { signal },
    ),
);

export const searchIncidents = withValidation(
  SearchIncidentsArgsSchema,
  (args, { transport, signal }) =>
    transport.send("POST", "/api/v1/incidents/search", {
      body: withoutUndefined(args),
      signal,
    }),
);

export const postMetrics = withValidation(
  PostMetricsArgsSchema,
  (args, { transport, signal }) =>
    transport.send("POST", "/api/v2/measurements", {
      body: measurementBody(args),
      signal,
    }),
);

export const exportMetrics = withValidation(
  ExportMetricsArgsSchema,
  (args, { transport, signal }) =>
    transport.send("POST", "/api/v2/measurements/export", {
      query: { file_format: args.file_format },
      body: measurementBody(args),
      signal,
    }),
);

export const healthCheck = withValidation(
  HealthCheckArgsSchema,
  (_args, { transport, signal }) =>
    transport.send("GET", "/api/v1/health", { signal }),
);
