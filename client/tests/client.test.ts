import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { ExperimentClient, ConfigurationError, setupInstructions } from "../src/index.js";

// ── Helpers ──────────────────────────────────────────────────────────

const API_URL = "http://api.test";
const API_KEY = "exp_test-key";

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

function createLogger() {
  return { warn: vi.fn(), error: vi.fn() };
}

// ── Tests ────────────────────────────────────────────────────────────

describe("ExperimentClient", () => {
  let fetchSpy: Mock<typeof fetch>;
  let logger: ReturnType<typeof createLogger>;
  let client: ExperimentClient;

  function sent(index = 0) {
    const [url, init] = fetchSpy.mock.calls[index];
    return {
      url: String(url),
      method: init?.method,
      headers: new Headers(init?.headers),
      body: init?.body ? JSON.parse(String(init.body)) : undefined,
    };
  }

  beforeEach(() => {
    fetchSpy = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchSpy);
    logger = createLogger();
    client = new ExperimentClient({ apiKey: API_KEY, apiUrl: `${API_URL}/`, logger });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.unstubAllEnvs();
  });

  describe("configuration", () => {
    it("rejects a missing API key", () => {
      expect(() => new ExperimentClient({ apiKey: "" })).toThrow(ConfigurationError);
    });

    it("fromEnv reads the key and URL from the environment", () => {
      vi.stubEnv("EXPERIMENT_BOT_KEY", "exp_from-env");
      vi.stubEnv("EXPERIMENT_BOT_API_URL", "http://env.test//");

      const fromEnv = ExperimentClient.fromEnv();

      expect(fromEnv.baseUrl).toBe("http://env.test");
    });

    it("fromEnv throws a ConfigurationError when the key is unset", () => {
      vi.stubEnv("EXPERIMENT_BOT_KEY", "");

      expect(() => ExperimentClient.fromEnv()).toThrow(/EXPERIMENT_BOT_KEY/);
    });

    it("defaults the base URL to the local backend", () => {
      expect(new ExperimentClient({ apiKey: API_KEY }).baseUrl).toBe("http://localhost:3001");
    });

    it("uses an injected fetch instead of the global one", async () => {
      const injected = vi.fn<typeof fetch>().mockResolvedValue(jsonResponse({ success: true }));
      const custom = new ExperimentClient({ apiKey: API_KEY, apiUrl: API_URL, fetch: injected });

      await expect(custom.validateConnection()).resolves.toBe(true);

      expect(injected).toHaveBeenCalledOnce();
      expect(fetchSpy).not.toHaveBeenCalled();
    });
  });

  describe("notify", () => {
    it("posts the message with a Bearer key", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true }));

      await expect(client.notify("Training done")).resolves.toBe(true);

      const request = sent();
      expect(request.url).toBe(`${API_URL}/api/notify`);
      expect(request.method).toBe("POST");
      expect(request.headers.get("authorization")).toBe(`Bearer ${API_KEY}`);
      expect(request.headers.get("content-type")).toBe("application/json");
      expect(request.body.message).toBe("Training done");
    });

    it("merges environment metadata under caller fields", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true }));

      await client.notify("hi", { hostname: "override", loss: 0.25 });

      const { metadata } = sent().body;
      expect(metadata.hostname).toBe("override");
      expect(metadata.loss).toBe(0.25);
      expect(metadata.pid).toBe(process.pid);
      expect(metadata.platform).toBe(process.platform);
      expect(metadata.nodeVersion).toBe(process.version);
      expect(metadata.cwd).toBe(process.cwd());
    });

    it("sends null metadata when collection is off and none is given", async () => {
      const bare = new ExperimentClient({ apiKey: API_KEY, apiUrl: API_URL, collectMetadata: false, logger });
      fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true }));

      await bare.notify("plain");

      expect(sent().body).toEqual({ message: "plain", metadata: null });
    });

    it("returns false and logs on an HTTP error", async () => {
      fetchSpy.mockResolvedValueOnce(new Response("rate limited", { status: 429 }));

      await expect(client.notify("hi")).resolves.toBe(false);

      expect(logger.warn).toHaveBeenCalledWith("notify failed", { status: 429, body: "rate limited" });
    });

    it("returns false and logs when the backend is unreachable", async () => {
      fetchSpy.mockRejectedValueOnce(new Error("connect ECONNREFUSED"));

      await expect(client.notify("hi")).resolves.toBe(false);

      expect(logger.error).toHaveBeenCalledWith("notify failed", { error: "connect ECONNREFUSED" });
    });
  });

  describe("processes", () => {
    it("startProcess generates an id when none is given", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true }, 201));

      const processId = await client.startProcess({ name: "train" });

      expect(processId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
      expect(sent().url).toBe(`${API_URL}/api/process/start`);
      expect(sent().body).toEqual({ processId, name: "train" });
    });

    it("startProcess passes an explicit id, metadata and parent", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true }, 201));

      const processId = await client.startProcess({
        name: "epoch",
        processId: "run-7",
        metadata: { epoch: 1 },
        parentId: "run-1",
      });

      expect(processId).toBe("run-7");
      expect(sent().body).toEqual({ processId: "run-7", name: "epoch", metadata: { epoch: 1 }, parentId: "run-1" });
    });

    it("startProcess resolves to null when the backend refuses", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ success: false }, 409));

      await expect(client.startProcess({ name: "train", processId: "dup" })).resolves.toBeNull();
    });

    it("endProcess returns the backend's result", async () => {
      fetchSpy.mockResolvedValueOnce(
        jsonResponse({
          success: true,
          data: { processId: "run-7", status: "completed", durationSeconds: 12.5 },
        }),
      );

      const result = await client.endProcess("run-7", "completed", { accuracy: 0.9 });

      expect(result).toEqual({ processId: "run-7", status: "completed", durationSeconds: 12.5 });
      expect(sent().body).toEqual({ processId: "run-7", status: "completed", metadata: { accuracy: 0.9 } });
    });

    it("endProcess returns null on an unexpected body", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true }));

      await expect(client.endProcess("run-7", "error")).resolves.toBeNull();
      expect(logger.warn).toHaveBeenCalledOnce();
    });

    it("heartbeat posts the process id and metadata", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true }));

      await expect(client.heartbeat("run-7", { step: 40 })).resolves.toBe(true);

      expect(sent().url).toBe(`${API_URL}/api/process/heartbeat`);
      expect(sent().body).toEqual({ processId: "run-7", metadata: { step: 40 } });
    });
  });

  describe("validateConnection", () => {
    it("is true for a valid key", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true, data: { valid: true } }));

      await expect(client.validateConnection()).resolves.toBe(true);

      expect(sent().method).toBe("GET");
      expect(sent().url).toBe(`${API_URL}/api/validate`);
      expect(sent().body).toBeUndefined();
    });

    it("is false for a rejected key", async () => {
      fetchSpy.mockResolvedValueOnce(jsonResponse({ success: false }, 401));

      await expect(client.validateConnection()).resolves.toBe(false);
    });
  });
});

describe("setupInstructions", () => {
  it("explains where the key goes", () => {
    const lines = setupInstructions().split("\n");

    expect(lines).toContain("   export EXPERIMENT_BOT_KEY=your_api_key_here");
    expect(lines).toContain("3. Message your bot with /start to get your API key");
  });
});
