import { clearCache } from "@/lib/cache";
import { getHistoricalSeries, loadPriceTable, MarketDataError, NoPriceDataError } from "@/lib/yahoo";
import { afterEach, describe, expect, it, vi } from "vitest";

function jsonResponse(payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status: 200,
    headers: {
      "Content-Type": "application/json"
    }
  });
}

function chartPayload(input: {
  timestamps: number[];
  open: (number | null)[];
  close: (number | null)[];
  adjclose: (number | null)[];
}) {
  return {
    chart: {
      result: [
        {
          timestamp: input.timestamps,
          indicators: {
            quote: [{ open: input.open, close: input.close }],
            adjclose: [{ adjclose: input.adjclose }]
          }
        }
      ],
      error: null
    }
  };
}

describe("yahoo market data", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    clearCache();
  });

  it("retries once and then returns parsed price bars", async () => {
    const fetchMock = vi
      .fn()
      .mockRejectedValueOnce(new Error("temporary network failure"))
      .mockResolvedValue(
        jsonResponse(
          chartPayload({
            timestamps: [1704153600, 1704240000],
            open: [99, 100.5],
            close: [99.5, 100.8],
            adjclose: [100, 101]
          })
        )
      );
    vi.stubGlobal("fetch", fetchMock);

    const bars = await getHistoricalSeries("retry", "2024-01-02", "2024-01-03");

    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(bars).toEqual([
      { date: "2024-01-02", open: 99, close: 99.5, adjustedClose: 100 },
      { date: "2024-01-03", open: 100.5, close: 100.8, adjustedClose: 101 }
    ]);
  });

  it("keeps partial rows and drops empty ones", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        jsonResponse(
          chartPayload({
            timestamps: [1704153600, 1704240000, 1704326400],
            open: [null, 10, null],
            close: [null, 11, 12],
            adjclose: [null, null, 12]
          })
        )
      )
    );

    const bars = await getHistoricalSeries("PART", "2024-01-02", "2024-01-04");

    expect(bars).toEqual([
      { date: "2024-01-03", open: 10, close: 11, adjustedClose: null },
      { date: "2024-01-04", open: null, close: 12, adjustedClose: 12 }
    ]);
  });

  it("raises the upstream error description", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockResolvedValue(
        jsonResponse({ chart: { result: null, error: { description: "No data found" } } })
      )
    );

    const request = getHistoricalSeries("NOPE", "2024-01-02", "2024-01-03");

    await expect(request).rejects.toThrowError(NoPriceDataError);
    await expect(request).rejects.toThrowError("Market data error for NOPE: No data found");
  });

  it("does not retry an unknown symbol", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ chart: { result: null, error: { description: "Not Found" } } }), {
        status: 404
      })
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(getHistoricalSeries("GONE", "2024-01-02", "2024-01-03")).rejects.toThrowError(
      NoPriceDataError
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("keeps a symbol without history in the table as an empty series", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn().mockImplementation(async (url: string) => {
        if (url.includes("/GONE?")) {
          return new Response(JSON.stringify({ chart: { result: null, error: { description: "Not Found" } } }), {
            status: 404
          });
        }
        return jsonResponse(
          chartPayload({
            timestamps: [1704153600, 1704240000],
            open: [10, 11],
            close: [10, 11],
            adjclose: [10, 11]
          })
        );
      })
    );

    const table = await loadPriceTable(["AAA", "GONE"], "2024-01-02", "2024-01-03");

    expect(table.dates).toEqual(["2024-01-02", "2024-01-03"]);
    expect(table.series.get("AAA")?.adjustedClose).toEqual([10, 11]);
    expect(table.series.get("GONE")).toEqual({
      open: [null, null],
      close: [null, null],
      adjustedClose: [null, null]
    });
  });

  it("still rejects the table when the upstream keeps failing", async () => {
    vi.useFakeTimers();
    vi.stubGlobal(
      "fetch",
      vi.fn().mockImplementation(async (url: string) =>
        url.includes("/DOWN?")
          ? new Response("unavailable", { status: 503 })
          : jsonResponse(chartPayload({ timestamps: [1704153600], open: [10], close: [10], adjclose: [10] }))
      )
    );

    const load = loadPriceTable(["AAA", "DOWN"], "2024-01-02", "2024-01-03");
    const assertion = expect(load).rejects.toThrowError("Market data request failed with status 503");
    await vi.runAllTimersAsync();

    await assertion;
    await expect(load).rejects.toBeInstanceOf(MarketDataError);
    await expect(load).rejects.not.toBeInstanceOf(NoPriceDataError);
  });

  it("builds one memoized table for a symbol set", async () => {
    const fetchMock = vi.fn().mockImplementation(async (url: string) => {
      const isFirst = url.includes("/AAA?");
      return jsonResponse(
        chartPayload({
          timestamps: isFirst ? [1704153600, 1704240000] : [1704240000],
          open: isFirst ? [10, 11] : [50],
          close: isFirst ? [10, 11] : [50],
          adjclose: isFirst ? [10, 11] : [50]
        })
      );
    });
    vi.stubGlobal("fetch", fetchMock);

    const table = await loadPriceTable(["bbb", "AAA"], "2024-01-02", "2024-01-03");
    const again = await loadPriceTable(["AAA", "BBB", "AAA"], "2024-01-02", "2024-01-03");

    expect(again).toBe(table);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(table.dates).toEqual(["2024-01-02", "2024-01-03"]);
    expect(table.series.get("BBB")?.adjustedClose).toEqual([null, 50]);
  });

  it("returns an empty table without fetching when no symbol is requested", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const table = await loadPriceTable([], "2024-01-02", "2024-01-03");

    expect(table.dates).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
