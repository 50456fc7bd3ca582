import iconv from "iconv-lite";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { DEFAULT_CONFIG } from "./config";
import { encodeLegacy, isGroupId, ScheduleFetcher } from "./fetcher";

const source = {
  ...DEFAULT_CONFIG.source,
  base_url: "https://timetable.test/cgi-bin/timetable.cgi",
};
const BODY = "<html><h4>Розклад групи ІПм-24-1</h4></html>";

function cp1251Response(text: string, init?: ResponseInit) {
  return new Response(new Uint8Array(iconv.encode(text, "win1251")), init);
}

describe("isGroupId", () => {
  it("accepts signed integers only", () => {
    expect(isGroupId("-1985")).toBe(true);
    expect(isGroupId("42")).toBe(true);
    expect(isGroupId("ІПм-24-1")).toBe(false);
    expect(isGroupId("12a")).toBe(false);
    expect(isGroupId("")).toBe(false);
  });
});

describe("encodeLegacy", () => {
  it("percent-encodes cp1251 bytes", () => {
    expect(encodeLegacy("ІПм-24-1", "win1251")).toBe("%B2%CF%EC-24-1");
    expect(encodeLegacy("ab c_~.", "win1251")).toBe("ab%20c_~.");
  });
  it("returns null for characters outside the code page", () => {
    expect(encodeLegacy("ІПм-24-1 ✓", "win1251")).toBeNull();
  });
});

describe("ScheduleFetcher", () => {
  const fetchMock = vi.fn(
    async (_input: string | URL | Request, _init?: RequestInit) =>
      cp1251Response(BODY),
  );
  beforeEach(() => {
    fetchMock.mockClear();
    vi.stubGlobal("fetch", fetchMock);
  });
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("uses GET for a numeric id", async () => {
    const html = await new ScheduleFetcher(source).fetch("-1985");
    expect(html).toBe(BODY);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0]?.[0]).toBe(
      "https://timetable.test/cgi-bin/timetable.cgi?n=700&group=-1985",
    );
    expect(fetchMock.mock.calls[0]?.[1]?.method).toBeUndefined();
  });

  it("uses POST with a cp1251 form for a name", async () => {
    const html = await new ScheduleFetcher(source).fetch("ІПм-24-1");
    expect(html).toBe(BODY);
    const call = fetchMock.mock.calls[0];
    const init = call?.[1];
    expect(call?.[0]).toBe("https://timetable.test/cgi-bin/timetable.cgi?n=700");
    expect(init?.method).toBe("POST");
    expect(init?.headers).toEqual({
      "Content-Type": "application/x-www-form-urlencoded",
    });
    expect(init?.body).toBe(
      "faculty=0&teacher=&course=0&group=%B2%CF%EC-24-1&sdate=&edate=&n=700",
    );
  });

  it("decodes cp1251 even when the server claims utf-8", async () => {
    fetchMock.mockResolvedValueOnce(
      cp1251Response(BODY, {
        headers: { "Content-Type": "text/html; charset=utf-8" },
      }),
    );
    expect(await new ScheduleFetcher(source).fetch("-1985")).toBe(BODY);
  });

  it("fails without a request when the name can't be encoded", async () => {
    expect(await new ScheduleFetcher(source).fetch("ІПм-24-1 ✓")).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("fails on an error status", async () => {
    fetchMock.mockResolvedValueOnce(cp1251Response("oops", { status: 500 }));
    expect(await new ScheduleFetcher(source).fetch("-1985")).toBeNull();
  });

  it("fails on a network error", async () => {
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    expect(await new ScheduleFetcher(source).fetch("ІПм-24-1")).toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});
