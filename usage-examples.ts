import { deepFreeze } from "./freeze.js";

export interface ToolExample {
  title: string;
  arguments: Readonly<Record<string, unknown>>;
}

export interface ToolExamples {
  description: string;
  examples: readonly ToolExample[];
}

export type ExampleCategory = Readonly<Record<string, ToolExamples>>;

/** Example tool calls, grouped the way get_api_categories groups the tools. */
export const USAGE_EXAMPLES: Readonly<Record<string, ExampleCategory>> =
  deepFreeze({
    deployments: {
      list_deployments: {
        description: "List recent deployments with filtering (read-only)",
        examples: [
          {
            title: "List 10 most recent deployments",
            arguments: { limit: 10, sort_dir: "desc" },
          },
          {
            title: "List deployments for a specific repository",
            arguments: { repository_id: 12345, limit: 20 },
          },
          {
            title: "List deployments in a date range",
            arguments: { after: "2024-01-01", before: "2024-12-31" },
          },
        ],
      },
    },
    teams: {
      search_teams_v2: {
        description: "Search teams with the V2 API (read-only)",
        examples: [
          { title: "Search all teams", arguments: { page_size: 50 } },
          {
            title: "Search teams by name",
            arguments: { search_term: "backend", page_size: 20 },
          },
        ],
      },
    },
    users: {
      search_users: {
        description: "Search users with filtering (read-only)",
        examples: [
          { title: "Search all users", arguments: { page_size: 50 } },
          {
            title: "Search users by name",
            arguments: {
              search_by_field: "name",
              search_term: "alex",
              order_by: "name",
            },
          },
        ],
      },
    },
    services: {
      get_services: {
        description: "List services, optionally for one repository",
        examples: [
          { title: "List all services", arguments: {} },
          {
            title: "List services of a repository",
            arguments: { repository_id: 12345 },
          },
        ],
      },
      get_service: {
        description: "Get a single service",
        examples: [
          { title: "Get service by ID", arguments: { service_id: 42 } },
        ],
      },
    },
    incidents: {
      search_incidents: {
        description: "Search incidents with filtering (read-only)",
        examples: [
          {
            title: "Search recent incidents",
            arguments: { limit: 20, after: "2024-01-01" },
          },
          {
            title: "Search incidents by status",
            arguments: { status: "open", limit: 10 },
          },
        ],
      },
      get_incident: {
        description: "Get specific incident details (read-only)",
        examples: [
          {
            title: "Get incident by provider ID",
            arguments: { provider_id: "INC-001" },
          },
        ],
      },
    },
    metrics: {
      post_metrics: {
        description: "Query metrics data",
        examples: [
          {
            title: "Get weekly cycle time for the organization",
            arguments: {
              group_by: "organization",
              roll_up: "1w",
              requested_metrics: [
                { name: "branch.computed.cycle_time", agg: "p75" },
              ],
              time_ranges: [{ after: "2024-01-01", before: "2024-01-31" }],
            },
          },
        ],
      },
      export_metrics: {
        description: "Export a metrics query as a file",
        examples: [
          {
            title: "Export monthly merged PRs per team as CSV",
            arguments: {
              group_by: "team",
              roll_up: "1mo",
              requested_metrics: [{ name: "pr.merged" }],
              time_ranges: [{ after: "2024-01-01", before: "2024-06-30" }],
              file_format: "csv",
            },
          },
        ],
      },
    },
    health: {
      health_check: {
        description: "Check API health",
        examples: [{ title: "Check that the API is reachable", arguments: {} }],
      },
    },
    metrics_discovery: {
      get_supported_metrics: {
        description: "Get the full metrics reference",
        examples: [{ title: "Get all supported metrics", arguments: {} }],
      },
      search_metrics: {
        description: "Search for specific metrics",
        examples: [
          {
            title: "Search cycle time metrics",
            arguments: { search_term: "cycle", category: "cycle_time" },
          },
          {
            title: "Find metrics with aggregation support",
            arguments: { search_term: "time", has_aggregation: true },
          },
        ],
      },
      get_metrics_by_category: {
        description: "Get metrics organized by category",
        examples: [
          {
            title: "Get all pull request metrics",
            arguments: { category: "pull_requests" },
          },
          { title: "Get all categories overview", arguments: {} },
        ],
      },
    },
    teams_discovery: {
      get_active_teams: {
        description: "Get the active teams reference",
        examples: [
          { title: "Get all active teams", arguments: {} },
          { title: "Get only QA teams", arguments: { team_type: "qa" } },
        ],
      },
      get_comparable_teams: {
        description: "Get teams suitable for comparison",
        examples: [
          { title: "Get engineering teams for comparison", arguments: {} },
        ],
      },
      search_teams_by_focus: {
        description: "Search teams by focus area",
        examples: [
          {
            title: "Find integration teams",
            arguments: { search_term: "integration", comparable_only: true },
          },
          {
            title: "Find QA teams",
            arguments: { search_term: "automation", team_type: "qa" },
          },
        ],
      },
    },
  });

export interface MetricQueryExample {
  description: string;
  arguments: {
    group_by: string;
    roll_up: string;
    requested_metrics: ReadonlyArray<{ name: string; agg?: string }>;
    time_ranges: ReadonlyArray<{ after: string; before: string }>;
  };
}

export const METRIC_QUERY_EXAMPLES: Readonly<
  Record<string, MetricQueryExample>
> = deepFreeze({
  cycle_time_analysis: {
    description: "Analyze development cycle time with different aggregations",
    arguments: {
      group_by: "team",
      roll_up: "1w",
      requested_metrics: [
        { name: "branch.computed.cycle_time", agg: "p75" },
        { name: "branch.time_to_pr", agg: "p50" },
        { name: "branch.review_time", agg: "avg" },
      ],
      time_ranges: [{ after: "2024-01-01", before: "2024-01-31" }],
    },
  },
  pr_quality_metrics: {
    description: "Analyze pull request quality and review patterns",
    arguments: {
      group_by: "repository",
      roll_up: "1mo",
      requested_metrics: [
        { name: "pr.merged" },
        { name: "pr.review_depth" },
        { name: "pr.merged.without.review.count" },
        { name: "pr.merged.size", agg: "p75" },
      ],
      time_ranges: [{ after: "2024-01-01", before: "2024-12-31" }],
    },
  },
  activity_overview: {
    description: "Get an overview of development activity",
    arguments: {
      group_by: "organization",
      roll_up: "1d",
      requested_metrics: [
        { name: "commit.total.count" },
        { name: "pr.new" },
        { name: "pr.reviews" },
        { name: "commit.activity_days" },
      ],
      time_ranges: [{ after: "2024-12-01", before: "2024-12-31" }],
    },
  },
  code_quality_analysis: {
    description: "Analyze code quality through rework and refactor metrics",
    arguments: {
      group_by: "team",
      roll_up: "1w",
      requested_metrics: [
        { name: "commit.activity.new_work.count" },
        { name: "commit.activity.rework.count" },
        { name: "commit.activity.refactor.count" },
        { name: "commit.total_changes" },
      ],
      time_ranges: [{ after: "2024-01-01", before: "2024-03-31" }],
    },
  },
  reliability_metrics: {
    description: "Monitor reliability and incident metrics",
    arguments: {
      group_by: "organization",
      roll_up: "1mo",
      requested_metrics: [
        { name: "pm.mttr" },
        { name: "pm.cfr.issues.done" },
        { name: "releases.count" },
      ],
      time_ranges: [{ after: "2024-01-01", before: "2024-12-31" }],
    },
  },
});

export const AGGREGATION_GUIDE = deepFreeze({
  p75: "75th percentile, the typical high end of performance",
  p50: "50th percentile (median), typical performance",
  avg: "Average, useful for overall trends but skewed by outliers",
} as const);

export const METRIC_BEST_PRACTICES: readonly string[] = deepFreeze([
  "Use p75 for cycle time metrics to understand realistic delivery times",
  "Use p50 for median performance analysis",
  "Combine count metrics with time-based metrics",
  "Use roll_up 1d for detailed analysis, 1w for trends and 1mo for a high-level overview",
]);
