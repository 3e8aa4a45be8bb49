import { describe, expect, it } from "vitest";
import {
  discoverApi,
  getActiveTeams,
  getApiCategories,
  getComparableTeams,
  getEndpointDetails,
  getExcludedTeams,
  getMetricCategoriesOverview,
  getMetricsByCategory,
  getTeamsByType,
  getUsageExamples,
  listEndpoints,
  searchMetrics,
  searchTeamsByFocus,
} from "./discovery.js";
import { ENDPOINTS } from "./endpoints-catalog.js";
import { METRIC_CATEGORIES, SUPPORTED_METRICS } from "./metrics-catalog.js";
import { ACTIVE_TEAMS } from "./teams-catalog.js";
import {
  AGGREGATION_GUIDE,
  METRIC_BEST_PRACTICES,
  METRIC_QUERY_EXAMPLES,
  USAGE_EXAMPLES,
} from "./usage-examples.js";

describe("metric catalog", () => {
  it("partitions every metric into exactly one category", () => {
    const perCategory = METRIC_CATEGORIES.map((category) => {
      const result = getMetricsByCategory(category);
      return result.ok ? result.value.length : -1;
    });

    expect(perCategory).toEqual([5, 6, 5, 1, 1, 2, 2]);
    expect(perCategory.reduce((sum, count) => sum + count, 0)).toBe(
      SUPPORTED_METRICS.length,
    );
    const names = new Set(SUPPORTED_METRICS.map((metric) => metric.name));
    expect(names.size).toBe(SUPPORTED_METRICS.length);
  });

  it("rejects an unknown category", () => {
    const result = getMetricsByCategory("velocity");

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("VALIDATION_ERROR");
      expect(result.error).toMatchObject({ field: "category" });
    }
  });

  it("summarizes categories with their metric names", () => {
    const overview = getMetricCategoriesOverview();

    expect(overview.totalCategories).toBe(7);
    const releases = overview.categories.find(
      (category) => category.id === "releases",
    );
    expect(releases).toMatchObject({
      metricCount: 1,
      metrics: ["releases.count"],
    });
  });
});

describe("searchMetrics", () => {
  it("matches names and descriptions case-insensitively", () => {
    const names = (term: string) =>
      searchMetrics(term).map((metric) => metric.name);

    expect(names("cycle")).toEqual(["branch.computed.cycle_time"]);
    expect(names("  CYCLE ")).toEqual(["branch.computed.cycle_time"]);
  });

  it("returns every metric for an empty term", () => {
    expect(searchMetrics("")).toHaveLength(SUPPORTED_METRICS.length);
  });

  it("combines filters with AND", () => {
    const withAggregation = searchMetrics("pr", {
      category: "pull_requests",
      hasAggregation: true,
    });
    expect(withAggregation.map((metric) => metric.name)).toEqual([
      "pr.merged.size",
    ]);

    const countsOnly = searchMetrics("merged", { hasAggregation: false });
    expect(countsOnly.map((metric) => metric.name)).toEqual([
      "pr.merged",
      "pr.merged.without.review.count",
    ]);
  });

  it("returns nothing when no metric matches", () => {
    expect(searchMetrics("deployment frequency")).toEqual([]);
  });
});

describe("teams", () => {
  it("keeps comparable teams inside the active set and away from qa", () => {
    const active = new Set(getActiveTeams());
    const comparable = getComparableTeams();

    expect(comparable).toHaveLength(6);
    for (const team of comparable) {
      expect(active.has(team)).toBe(true);
      expect(team.type).toBe("engineering");
    }
    expect(getExcludedTeams().map((team) => team.id)).toEqual([
      "qa_automation",
    ]);
  });

  it("filters active teams by type", () => {
    expect(getActiveTeams("qa").map((team) => team.id)).toEqual([
      "qa_automation",
    ]);
    expect(getActiveTeams("engineering")).toHaveLength(6);
  });

  it("groups teams by type", () => {
    expect(getTeamsByType("qa")).toMatchObject({ id: "qa", totalTeams: 1 });

    const overview = getTeamsByType();
    expect(overview).toMatchObject({
      totalTypes: 2,
      types: [
        { id: "engineering", teamCount: 6 },
        { id: "qa", teamCount: 1, teams: ["qa_automation"] },
      ],
    });
  });

  it("searches focus areas within a team type", () => {
    const qa = searchTeamsByFocus("automation", { teamType: "qa" });
    expect(qa.map((team) => team.id)).toEqual(["qa_automation"]);
    expect(
      searchTeamsByFocus("automation", { teamType: "engineering" }),
    ).toEqual([]);
  });

  it("searches names, short codes and focus areas", () => {
    const ids = (term: string) =>
      searchTeamsByFocus(term).map((team) => team.id);

    expect(ids("integration")).toEqual(["integrations_synergy"]);
    expect(ids("crm")).toEqual(["core_crm"]);
    expect(searchTeamsByFocus("quality", { comparableOnly: true })).toEqual([]);
  });
});

describe("endpoint discovery", () => {
  it("lists endpoints by category", () => {
    expect(listEndpoints()).toHaveLength(ENDPOINTS.length);
    const services = listEndpoints("services");
    expect(services.map((endpoint) => endpoint.toolName)).toEqual([
      "get_services",
      "get_service",
    ]);
  });

  it("describes the API as read-only and grouped", () => {
    const overview = discoverApi("https://api.test.local", "metrics");

    expect(overview.api).toEqual({
      name: "LinearB Public API",
      baseUrl: "https://api.test.local",
    });
    expect(overview.readOnly).toBe(true);
    expect(overview.totalEndpoints).toBe(2);
    expect(overview.categories).toEqual({
      metrics: [
        "POST /api/v2/measurements",
        "POST /api/v2/measurements/export",
      ],
    });
  });

  it("only exposes read methods", () => {
    for (const endpoint of ENDPOINTS) {
      expect(["GET", "POST"]).toContain(endpoint.method);
      expect(endpoint.toolName).not.toMatch(/^(create|update|delete)_/);
    }
  });

  it("finds endpoint details by path and method", () => {
    const result = getEndpointDetails("/api/v1/incidents/search", "post");

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value.toolName).toBe("search_incidents");
  });

  it("reports unknown paths and methods as NOT_FOUND", () => {
    const missingPath = getEndpointDetails("/api/v1/nothing");
    expect(missingPath.ok).toBe(false);
    if (!missingPath.ok) {
      expect(missingPath.error).toMatchObject({
        kind: "NOT_FOUND",
        message: "Endpoint '/api/v1/nothing' not found",
      });
    }

    const wrongMethod = getEndpointDetails("/api/v1/health", "DELETE");
    expect(wrongMethod.ok).toBe(false);
    if (!wrongMethod.ok) {
      expect(wrongMethod.error).toEqual({
        kind: "NOT_FOUND",
        message: "Method 'DELETE' not available for '/api/v1/health'",
        available: ["GET"],
      });
    }
  });

  it("adds the discovery tools as their own category", () => {
    const categories = getApiCategories([
      { name: "discover_api", description: "Overview" },
    ]);

    expect(categories.totalCategories).toBe(8);
    expect(categories.totalEndpoints).toBe(ENDPOINTS.length + 1);
    expect(categories.categories.discovery?.endpoints).toEqual([
      {
        tool: "discover_api",
        method: "N/A",
        path: "N/A",
        description: "Overview",
      },
    ]);
  });
});

describe("catalog immutability", () => {
  it("freezes catalogs all the way down", () => {
    const [firstEndpoint] = ENDPOINTS;
    const sortDir = firstEndpoint.parameters.find(
      (parameter) => parameter.name === "sort_dir",
    );

    expect(Object.isFrozen(ENDPOINTS)).toBe(true);
    expect(Object.isFrozen(firstEndpoint.parameters)).toBe(true);
    expect(Object.isFrozen(sortDir?.enum)).toBe(true);
    expect(Object.isFrozen(SUPPORTED_METRICS[0].aggregations)).toBe(true);
    expect(Object.isFrozen(ACTIVE_TEAMS[0].focusAreas)).toBe(true);
  });

  it("freezes nested usage examples", () => {
    const listExamples = USAGE_EXAMPLES.deployments.list_deployments.examples;
    const cycleTime = METRIC_QUERY_EXAMPLES.cycle_time_analysis.arguments;

    expect(Object.isFrozen(USAGE_EXAMPLES)).toBe(true);
    expect(Object.isFrozen(listExamples[0].arguments)).toBe(true);
    expect(Object.isFrozen(cycleTime.requested_metrics[0])).toBe(true);
    expect(Object.isFrozen(cycleTime.time_ranges)).toBe(true);
    expect(Object.isFrozen(AGGREGATION_GUIDE)).toBe(true);
    expect(Object.isFrozen(METRIC_BEST_PRACTICES)).toBe(true);
  });

  it("keeps a returned endpoint example from changing the catalog", () => {
    const result = getEndpointDetails("/api/v1/deployments");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const example = result.value.example;
    expect(Object.isFrozen(example)).toBe(true);
    expect(Reflect.set(example ?? {}, "limit", 999)).toBe(false);
    expect(ENDPOINTS[0].example).toEqual({ limit: 10, sort_dir: "desc" });
  });
});

describe("getUsageExamples", () => {
  it("finds examples for a single tool", () => {
    const result = getUsageExamples({ toolName: "list_deployments" });

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toMatchObject({
        tool: "list_deployments",
        category: "deployments",
      });
    }
  });

  it("reports an unknown tool as NOT_FOUND", () => {
    const result = getUsageExamples({ toolName: "create_deployment" });

    expect(result).toEqual({
      ok: false,
      error: {
        kind: "NOT_FOUND",
        message: "No examples found for tool 'create_deployment'",
      },
    });
  });

  it("lists all categories without filters", () => {
    const result = getUsageExamples();

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.value).toHaveProperty("allCategories");
  });
});
