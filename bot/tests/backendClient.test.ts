import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import { getUserStatus, registerUser, revokeKey, setMuted } from "../src/services/backendClient.js";
import { BACKEND_URL, SERVICE_TOKEN, jsonResponse } from "./helpers.js";

describe("backend client", () => {
  let fetchSpy: Mock<typeof fetch>;

  beforeEach(() => {
    fetchSpy = vi.fn<typeof fetch>();
    vi.stubGlobal("fetch", fetchSpy);
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("sends the service token on every call", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true, data: { apiKey: "exp_k", created: false } }));

    await registerUser({ platformUserId: "1", chatId: "1" });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe(`${BACKEND_URL}/api/register`);
    expect(init?.headers).toEqual({
      "Content-Type": "application/json",
      "X-Service-Token": SERVICE_TOKEN,
    });
  });

  it("unwraps the data envelope", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true, message: "API key revoked", data: { apiKey: "exp_k2" } }));

    expect(await revokeKey("1")).toEqual({ ok: true, data: { apiKey: "exp_k2" } });
  });

  it("reports the HTTP status of a failed call", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ success: false }, 404));

    expect(await getUserStatus("1")).toEqual({ ok: false, status: 404 });
  });

  it("turns transport errors into a failed result", async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError("fetch failed"));

    expect(await setMuted("1", true)).toEqual({ ok: false });
  });

  it("encodes the user id into the path", async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse({ success: true, data: { muted: true } }));

    await setMuted("a/b", true);

    expect(fetchSpy.mock.calls[0][0]).toBe(`${BACKEND_URL}/api/users/a%2Fb/mute`);
  });
});
