/**
 * Discovery service: read-only queries over the static catalogs so an agent
 * can learn the API surface, the metric vocabulary and the team roster
 * without external documentation.
 *
 * Every table here has a few dozen rows at most, so lookups are linear
 * scans. Search is plain case-insensitive substring matching.
 */

import {
  CATEGORY_DESCRIPTIONS,
  ENDPOINT_CATEGORIES,
  ENDPOINTS,
  type EndpointCategory,
  type EndpointDescriptor,
} from "./endpoints-catalog.js";
import { fail, notFound, ok, validationError, type Result } from "./errors.js";
import {
  isMetricCategory,
  METRIC_CATEGORIES,
  METRIC_CATEGORY_INFO,
  SUPPORTED_METRICS,
  type MetricCategory,
  type MetricDescriptor,
} from "./metrics-catalog.js";
import {
  ACTIVE_TEAMS,
  TEAM_TYPE_INFO,
  type TeamDescriptor,
  type TeamType,
} from "./teams-catalog.js";
import {
  AGGREGATION_GUIDE,
  METRIC_BEST_PRACTICES,
  METRIC_QUERY_EXAMPLES,
  USAGE_EXAMPLES,
  type ExampleCategory,
  type ToolExamples,
} from "./usage-examples.js";

export const API_NAME = "LinearB Public API";

export interface ToolSummary {
  name: string;
  description?: string;
}

const endpointKey = (endpoint: EndpointDescriptor) =>
  `${endpoint.method} ${endpoint.path}`;

const matches = (term: string, ...fields: readonly string[]) =>
  fields.some((field) => field.toLowerCase().includes(term));

const normalizeTerm = (term: string) => term.trim().toLowerCase();

// --- Endpoints ---

export function listEndpoints(category?: string): EndpointDescriptor[] {
  return ENDPOINTS.filter(
    (endpoint) => category === undefined || endpoint.category === category,
  );
}

export function getEndpointDetails(
  path: string,
  method = "GET",
): Result<EndpointDescriptor> {
  const normalizedMethod = method.trim().toUpperCase();
  const candidates = ENDPOINTS.filter((endpoint) => endpoint.path === path);

  if (candidates.length === 0) {
    return fail(
      notFound(
        `Endpoint '${path}' not found`,
        [...new Set(ENDPOINTS.map((endpoint) => endpoint.path))],
      ),
    );
  }

  const endpoint = candidates.find(
    (candidate) => candidate.method === normalizedMethod,
  );
  if (!endpoint) {
    return fail(
      notFound(
        `Method '${normalizedMethod}' not available for '${path}'`,
        candidates.map((candidate) => candidate.method),
      ),
    );
  }
  return ok(endpoint);
}

export function discoverApi(baseUrl: string, category?: string) {
  const endpoints = listEndpoints(category);
  const categories: Partial<Record<EndpointCategory, string[]>> = {};
  for (const endpoint of endpoints) {
    (categories[endpoint.category] ??= []).push(endpointKey(endpoint));
  }

  return {
    api: { name: API_NAME, baseUrl },
    readOnly: true,
    totalEndpoints: endpoints.length,
    categories,
    endpoints,
  };
}

interface CategoryEntry {
  tool: string;
  method: string;
  path: string;
  description: string;
}

export function getApiCategories(discoveryTools: readonly ToolSummary[]) {
  const categories: Record<
    string,
    { description: string; endpoints: CategoryEntry[] }
  > = {};

  for (const category of ENDPOINT_CATEGORIES) {
    categories[category] = {
      description: CATEGORY_DESCRIPTIONS[category],
      endpoints: listEndpoints(category).map((endpoint) => ({
        tool: endpoint.toolName,
        method: endpoint.method,
        path: endpoint.path,
        description: endpoint.summary,
      })),
    };
  }

  categories.discovery = {
    description: "API discovery and reference tools (served locally)",
    endpoints: discoveryTools.map((tool) => ({
      tool: tool.name,
      method: "N/A",
      path: "N/A",
      description: tool.description ?? "",
    })),
  };

  const values = Object.values(categories);
  return {
    totalCategories: values.length,
    totalEndpoints: values.reduce(
      (sum, category) => sum + category.endpoints.length,
      0,
    ),
    categories,
  };
}

export type UsageExamplesResult =
  | { tool: string; category: string; examples: ToolExamples }
  | { category: string; tools: ExampleCategory }
  | { allCategories: string[]; examples: typeof USAGE_EXAMPLES };

export function getUsageExamples(
  filters: { category?: string; toolName?: string } = {},
): Result<UsageExamplesResult> {
  const { category, toolName } = filters;

  if (toolName) {
    for (const [categoryName, tools] of Object.entries(USAGE_EXAMPLES)) {
      const examples = tools[toolName];
      if (examples) {
        return ok({ tool: toolName, category: categoryName, examples });
      }
    }
    return fail(notFound(`No examples found for tool '${toolName}'`));
  }

  if (category) {
    const tools = USAGE_EXAMPLES[category];
    if (!tools) {
      return fail(
        notFound(
          `Category '${category}' not found`,
          Object.keys(USAGE_EXAMPLES),
        ),
      );
    }
    return ok({ category, tools });
  }

  return ok({
    allCategories: Object.keys(USAGE_EXAMPLES),
    examples: USAGE_EXAMPLES,
  });
}

// --- Metrics ---

export function getSupportedMetrics() {
  return {
    totalMetrics: SUPPORTED_METRICS.length,
    totalCategories: METRIC_CATEGORIES.length,
    metrics: SUPPORTED_METRICS,
    categories: METRIC_CATEGORY_INFO,
    usageNote:
      "Use these metric names in post_metrics calls. " +
      "Specify an aggregation (p75, p50, avg) where the metric supports one.",
  };
}

export function searchMetrics(
  term: string,
  filters: { category?: MetricCategory; hasAggregation?: boolean } = {},
): MetricDescriptor[] {
  const needle = normalizeTerm(term);
  return SUPPORTED_METRICS.filter((metric) => {
    if (!matches(needle, metric.name, metric.description)) return false;
    if (filters.category && metric.category !== filters.category) return false;
    if (
      filters.hasAggregation !== undefined &&
      filters.hasAggregation !== metric.aggregations.length > 0
    )
      return false;
    return true;
  });
}

export function getMetricsByCategory(
  category: string,
): Result<MetricDescriptor[]> {
  if (!isMetricCategory(category)) {
    const expected = METRIC_CATEGORIES.join(", ");
    return fail(
      validationError(
        "category",
        `Unknown metric category '${category}'. Expected one of: ${expected}`,
      ),
    );
  }
  return ok(
    SUPPORTED_METRICS.filter((metric) => metric.category === category),
  );
}

export function getMetricCategoriesOverview() {
  return {
    totalCategories: METRIC_CATEGORY_INFO.length,
    categories: METRIC_CATEGORY_INFO.map((info) => {
      const metrics = SUPPORTED_METRICS.filter(
        (metric) => metric.category === info.id,
      );
      return {
        ...info,
        metricCount: metrics.length,
        metrics: metrics.map((metric) => metric.name),
      };
    }),
  };
}

export function getMetricExamples() {
  return {
    examples: METRIC_QUERY_EXAMPLES,
    aggregationGuide: AGGREGATION_GUIDE,
    bestPractices: METRIC_BEST_PRACTICES,
  };
}

// --- Teams ---

export function getActiveTeams(type?: TeamType): TeamDescriptor[] {
  return ACTIVE_TEAMS.filter(
    (team) => type === undefined || team.type === type,
  );
}

/** QA teams are excluded even if a catalog entry is flagged comparable. */
export function getComparableTeams(): TeamDescriptor[] {
  return ACTIVE_TEAMS.filter(
    (team) => team.comparable && team.type === "engineering",
  );
}

export function getExcludedTeams(): TeamDescriptor[] {
  const comparable = new Set(getComparableTeams());
  return ACTIVE_TEAMS.filter((team) => !comparable.has(team));
}

export function getTeamsByType(type?: TeamType) {
  if (type) {
    const info = TEAM_TYPE_INFO.find((candidate) => candidate.id === type);
    const teams = getActiveTeams(type);
    return { ...info, totalTeams: teams.length, teams };
  }

  return {
    totalTypes: TEAM_TYPE_INFO.length,
    types: TEAM_TYPE_INFO.map((info) => {
      const teams = getActiveTeams(info.id);
      return {
        ...info,
        teamCount: teams.length,
        teams: teams.map((team) => team.id),
      };
    }),
  };
}

export function searchTeamsByFocus(
  term: string,
  filters: { teamType?: TeamType; comparableOnly?: boolean } = {},
): TeamDescriptor[] {
  const needle = normalizeTerm(term);
  const comparable = new Set(getComparableTeams());
  return ACTIVE_TEAMS.filter((team) => {
    const fields = [team.name, team.description, team.shortCode];
    if (!matches(needle, ...fields, ...team.focusAreas)) return false;
    if (filters.teamType && team.type !== filters.teamType) return false;
    if (filters.comparableOnly && !comparable.has(team)) return false;
    return true;
  });
}
