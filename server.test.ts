import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { fail, ok, type Result } from "./errors.js";
import type {
  ApiTransport,
  HttpMethod,
  RequestOptions,
} from "./linearb-client.js";
import { createLogger } from "./logger.js";
import { createServer, renderResult } from "./server.js";

interface RecordedCall {
  method: HttpMethod;
  path: string;
  options: RequestOptions;
}

class StubTransport implements ApiTransport {
  readonly calls: RecordedCall[] = [];
  response: Result<unknown> = ok({ status: "healthy" });

  async send(method: HttpMethod, path: string, options: RequestOptions = {}) {
    this.calls.push({ method, path, options });
    return this.response;
  }
}

class ThrowingTransport implements ApiTransport {
  async send(): Promise<Result<unknown>> {
    throw new Error("socket hang up");
  }
}

function textOf(result: { content?: unknown; [key: string]: unknown }): string {
  const content = Array.isArray(result.content) ? result.content : [];
  const [first] = content;
  if (
    typeof first === "object" &&
    first !== null &&
    "text" in first &&
    typeof first.text === "string"
  ) {
    return first.text;
  }
  throw new Error("Expected a text content block");
}

async function connect(transport: ApiTransport) {
  const server = createServer({
    transport,
    baseUrl: "https://api.test.local",
    logger: createLogger("test", "silent"),
  });
  const client = new Client({ name: "test-client", version: "1.0.0" });
  const [clientTransport, serverTransport] =
    InMemoryTransport.createLinkedPair();
  await Promise.all([
    server.connect(serverTransport),
    client.connect(clientTransport),
  ]);
  return { server, client };
}

describe("MCP server", () => {
  let stub: StubTransport;
  let client: Client;
  let close: () => Promise<void>;

  beforeEach(async () => {
    stub = new StubTransport();
    const connected = await connect(stub);
    client = connected.client;
    close = async () => {
      await client.close();
      await connected.server.close();
    };
  });

  afterEach(async () => {
    await close();
  });

  it("lists only read-only tools", async () => {
    const { tools } = await client.listTools();
    const names = tools.map((tool) => tool.name);

    expect(names).toHaveLength(22);
    expect(names).toContain("health_check");
    expect(names).toContain("search_metrics");
    for (const tool of tools) {
      expect(tool.annotations?.readOnlyHint).toBe(true);
      expect(tool.name).not.toMatch(/^(create|update|delete)_/);
    }
  });

  it("derives API tool input schemas from the endpoint catalog", async () => {
    const { tools } = await client.listTools();
    const getService = tools.find((tool) => tool.name === "get_service");

    expect(getService?.inputSchema).toEqual({
      type: "object",
      properties: {
        service_id: { type: "integer", description: "Service ID", minimum: 1 },
      },
      required: ["service_id"],
    });
  });

  it("calls health_check and returns the JSON payload", async () => {
    const result = await client.callTool({
      name: "health_check",
      arguments: {},
    });

    expect(result.isError).toBeFalsy();
    expect(JSON.parse(textOf(result))).toEqual({ status: "healthy" });
    expect(stub.calls).toHaveLength(1);
    expect(stub.calls[0]).toMatchObject({
      method: "GET",
      path: "/api/v1/health",
    });
  });

  it("renders an upstream 500 as an API_ERROR", async () => {
    const error = {
      kind: "API_ERROR",
      statusCode: 500,
      message: "HTTP 500 Internal Server Error",
    } as const;
    stub.response = fail(error);

    const result = await client.callTool({
      name: "health_check",
      arguments: {},
    });

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toEqual({ error });
  });

  it("validates arguments before calling the API", async () => {
    const result = await client.callTool({
      name: "get_service",
      arguments: { service_id: "abc" },
    });

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result)).error).toMatchObject({
      kind: "VALIDATION_ERROR",
      field: "service_id",
    });
    expect(stub.calls).toHaveLength(0);
  });

  it("answers discovery tools without calling the API", async () => {
    const result = await client.callTool({
      name: "search_teams_by_focus",
      arguments: { search_term: "automation", team_type: "qa" },
    });

    const payload = JSON.parse(textOf(result));
    expect(payload.totalMatches).toBe(1);
    expect(payload.teams[0].id).toBe("qa_automation");
    expect(stub.calls).toHaveLength(0);
  });

  it("gives the category overview when no metric category is set", async () => {
    const result = await client.callTool({
      name: "get_metrics_by_category",
      arguments: {},
    });

    expect(JSON.parse(textOf(result)).totalCategories).toBe(7);
  });

  it("groups every tool into a category", async () => {
    const result = await client.callTool({
      name: "get_api_categories",
      arguments: {},
    });

    const payload = JSON.parse(textOf(result));
    expect(payload.totalCategories).toBe(8);
    expect(payload.totalEndpoints).toBe(22);
  });

  it("reports an unknown tool as NOT_FOUND", async () => {
    const result = await client.callTool({
      name: "create_deployment",
      arguments: {},
    });

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result)).error).toMatchObject({
      kind: "NOT_FOUND",
      message: "Unknown tool: create_deployment",
    });
  });

  it("reads the catalogs as resources", async () => {
    const { resources } = await client.listResources();
    expect(resources.map((resource) => resource.uri)).toEqual([
      "linearb://catalog/metrics",
      "linearb://catalog/teams",
      "linearb://catalog/endpoints",
    ]);

    const { contents } = await client.readResource({
      uri: "linearb://catalog/teams",
    });
    const [first] = contents;
    expect(first?.mimeType).toBe("application/json");
    const text =
      first && "text" in first && typeof first.text === "string"
        ? first.text
        : "";
    expect(JSON.parse(text).teams).toHaveLength(7);
  });

  it("rejects unknown resources", async () => {
    await expect(
      client.readResource({ uri: "linearb://catalog/secrets" }),
    ).rejects.toThrow("Unknown resource: linearb://catalog/secrets");
  });

  it("serves the usage prompt", async () => {
    const { prompts } = await client.listPrompts();
    expect(prompts.map((prompt) => prompt.name)).toEqual([
      "linearb-server-prompt",
    ]);

    const prompt = await client.getPrompt({ name: "linearb-server-prompt" });
    expect(prompt.messages).toHaveLength(1);
    expect(prompt.messages[0]?.role).toBe("user");
  });
});

describe("tool errors thrown by the transport", () => {
  it("become UNKNOWN_ERROR results", async () => {
    const { client, server } = await connect(new ThrowingTransport());

    const result = await client.callTool({
      name: "health_check",
      arguments: {},
    });

    expect(result.isError).toBe(true);
    expect(JSON.parse(textOf(result))).toEqual({
      error: { kind: "UNKNOWN_ERROR", message: "socket hang up" },
    });
    await client.close();
    await server.close();
  });
});

describe("renderResult", () => {
  it("returns text payloads unchanged", () => {
    expect(renderResult(ok("a,b\n1,2\n"))).toEqual({
      content: [{ type: "text", text: "a,b\n1,2\n" }],
    });
  });

  it("pretty-prints JSON payloads", () => {
    expect(renderResult(ok({ total: 1 }))).toEqual({
      content: [{ type: "text", text: '{\n  "total": 1\n}' }],
    });
  });
});
