import { deepFreeze } from "./freeze.js";

export const METRIC_CATEGORIES = [
  "cycle_time",
  "pull_requests",
  "commits",
  "releases",
  "activity",
  "branches",
  "incidents",
] as const;

export type MetricCategory = (typeof METRIC_CATEGORIES)[number];

export const AGGREGATIONS = ["p75", "p50", "avg"] as const;

export type Aggregation = (typeof AGGREGATIONS)[number];

export interface MetricDescriptor {
  name: string;
  category: MetricCategory;
  description: string;
  /** Empty for metrics that are reported as plain counts or sums. */
  aggregations: readonly Aggregation[];
  units: string;
}

export interface MetricCategoryInfo {
  id: MetricCategory;
  name: string;
  description: string;
}

export function isMetricCategory(value: string): value is MetricCategory {
  return METRIC_CATEGORIES.some((category) => category === value);
}

const PERCENTILES: readonly Aggregation[] = ["p75", "p50", "avg"];
const NONE: readonly Aggregation[] = [];

export const METRIC_CATEGORY_INFO: readonly MetricCategoryInfo[] = deepFreeze([
  {
    id: "cycle_time",
    name: "Cycle Time Metrics",
    description: "Metrics related to development cycle time and flow",
  },
  {
    id: "pull_requests",
    name: "Pull Request Metrics",
    description: "Metrics related to pull requests and code reviews",
  },
  {
    id: "commits",
    name: "Commit Metrics",
    description: "Metrics related to commits and code changes",
  },
  {
    id: "releases",
    name: "Release Metrics",
    description: "Metrics related to software releases",
  },
  {
    id: "activity",
    name: "Activity Metrics",
    description: "Metrics related to developer activity",
  },
  {
    id: "branches",
    name: "Branch Metrics",
    description: "Metrics related to branch states",
  },
  {
    id: "incidents",
    name: "Incident Metrics",
    description: "Metrics related to incidents and reliability",
  },
] satisfies MetricCategoryInfo[]);

export const SUPPORTED_METRICS: readonly MetricDescriptor[] = deepFreeze([
  {
    name: "branch.computed.cycle_time",
    category: "cycle_time",
    description:
      "Full cycle time (Coding time + Pickup time + Review time + Time to production)",
    aggregations: PERCENTILES,
    units: "min",
  },
  {
    name: "branch.time_to_pr",
    category: "cycle_time",
    description: "Coding time (Time to PR)",
    aggregations: PERCENTILES,
    units: "min",
  },
  {
    name: "branch.time_to_review",
    category: "cycle_time",
    description: "Pickup time (Time to review)",
    aggregations: PERCENTILES,
    units: "min",
  },
  {
    name: "branch.review_time",
    category: "cycle_time",
    description: "Review time",
    aggregations: PERCENTILES,
    units: "min",
  },
  {
    name: "branch.time_to_prod",
    category: "cycle_time",
    description: "Time to production (Time to deploy)",
    aggregations: PERCENTILES,
    units: "min",
  },
  {
    name: "pr.merged.size",
    category: "pull_requests",
    description: "The sum of PR sizes of merged PRs",
    aggregations: PERCENTILES,
    units: "lines of code",
  },
  {
    name: "pr.merged",
    category: "pull_requests",
    description: "The number of PRs that got merged",
    aggregations: NONE,
    units: "count",
  },
  {
    name: "pr.review_depth",
    category: "pull_requests",
    description: "The sum of comments divided by the sum of PRs",
    aggregations: NONE,
    units: "lines of comments",
  },
  {
    name: "pr.merged.without.review.count",
    category: "pull_requests",
    description: "The number of PRs that got merged without review",
    aggregations: NONE,
    units: "count",
  },
  {
    name: "pr.new",
    category: "pull_requests",
    description: "The number of opened PRs",
    aggregations: NONE,
    units: "count",
  },
  {
    name: "pr.reviews",
    category: "pull_requests",
    description: "The number of reviews on all PRs",
    aggregations: NONE,
    units: "count",
  },
  {
    name: "commit.activity.new_work.count",
    category: "commits",
    description: "The total new lines of code",
    aggregations: NONE,
    units: "count",
  },
  {
    name: "commit.total_changes",
    category: "commits",
    description: "The total lines of code that have been replaced",
    aggregations: NONE,
    units: "lines of code",
  },
  {
    name: "commit.activity.refactor.count",
    category: "commits",
    description:
      "The total lines of code that have been replaced that are older than 25 days",
    aggregations: NONE,
    units: "lines of code",
  },
  {
    name: "commit.activity.rework.count",
    category: "commits",
    description:
      "The total lines of code that have replaced code written within the last 25 days, but outside this branch",
    aggregations: NONE,
    units: "lines of code",
  },
  {
    name: "commit.total.count",
    category: "commits",
    description: "The sum of commits",
    aggregations: NONE,
    units: "count",
  },
  {
    name: "releases.count",
    category: "releases",
    description: "The number of releases",
    aggregations: NONE,
    units: "count",
  },
  {
    name: "commit.activity_days",
    category: "activity",
    description:
      "The amount of days of developer activity (commit/comment/PR/merge/review)",
    aggregations: NONE,
    units: "days",
  },
  {
    name: "branch.state.computed.done",
    category: "branches",
    description: "Number of branches that reached state done",
    aggregations: NONE,
    units: "count",
  },
  {
    name: "branch.state.active",
    category: "branches",
    description: "Number of active branches",
    aggregations: NONE,
    units: "count",
  },
  {
    name: "pm.mttr",
    category: "incidents",
    description: "Mean time to repair",
    aggregations: NONE,
    units: "min",
  },
  {
    name: "pm.cfr.issues.done",
    category: "incidents",
    description:
      "The sum of issues that are considered as incidents that reached a done state",
    aggregations: NONE,
    units: "count",
  },
] satisfies MetricDescriptor[]);
