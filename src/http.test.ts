import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FetchError } from "./errors.js";
import { DEFAULT_USER_AGENT, fetchPage } from "./http.js";

describe("DEFAULT_USER_AGENT", () => {
  it("looks like a desktop browser", () => {
    expect(DEFAULT_USER_AGENT).toContain("Mozilla");
    expect(DEFAULT_USER_AGENT).toContain("Chrome");
  });
});

describe("fetchPage", () => {
  const mockFetch = vi.fn();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("returns the body of a successful response", async () => {
    mockFetch.mockResolvedValueOnce(new Response("<html>ok</html>", { status: 200 }));

    await expect(fetchPage("https://archive.test/media/Movies/fandoms")).resolves.toBe("<html>ok</html>");
  });

  it("sends a browser user agent", async () => {
    mockFetch.mockResolvedValueOnce(new Response("", { status: 200 }));

    await fetchPage("https://archive.test/");

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch).toHaveBeenCalledWith(
      "https://archive.test/",
      expect.objectContaining({
        headers: expect.objectContaining({ "User-Agent": DEFAULT_USER_AGENT }),
      }),
    );
  });

  it("throws FetchError with the status on a non-2xx response", async () => {
    mockFetch.mockResolvedValueOnce(new Response("busy", { status: 503 }));

    const result = fetchPage("https://archive.test/media/Movies/fandoms");

    await expect(result).rejects.toThrow(FetchError);
    await expect(result).rejects.toMatchObject({
      url: "https://archive.test/media/Movies/fandoms",
      status: 503,
      message: "Request to https://archive.test/media/Movies/fandoms failed: HTTP 503",
    });
  });

  it("throws FetchError with the cause when the request fails", async () => {
    const cause = new TypeError("fetch failed");
    mockFetch.mockRejectedValueOnce(cause);

    const result = fetchPage("https://archive.test/");

    await expect(result).rejects.toMatchObject({
      name: "FetchError",
      status: null,
      cause,
      message: "Request to https://archive.test/ failed: fetch failed",
    });
  });

  it("throws FetchError when the body cannot be read", async () => {
    const cause = new TypeError("terminated");
    const response = new Response("<html>", { status: 200 });
    vi.spyOn(response, "text").mockRejectedValueOnce(cause);
    mockFetch.mockResolvedValueOnce(response);

    const result = fetchPage("https://archive.test/media/Movies/fandoms");

    await expect(result).rejects.toThrow(FetchError);
    await expect(result).rejects.toMatchObject({
      url: "https://archive.test/media/Movies/fandoms",
      status: null,
      cause,
      message: "Request to https://archive.test/media/Movies/fandoms failed: terminated",
    });
  });

  it("does not retry", async () => {
    mockFetch.mockResolvedValue(new Response("", { status: 500 }));

    await expect(fetchPage("https://archive.test/")).rejects.toThrow(FetchError);
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });
});
