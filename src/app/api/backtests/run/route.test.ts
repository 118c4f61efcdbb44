import { POST } from "@/app/api/backtests/run/route";
import { buildPriceTable } from "@/lib/price-table";
import type { PriceBar } from "@/lib/types";
import { loadPriceTable, MarketDataError } from "@/lib/yahoo";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("@/lib/yahoo", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/lib/yahoo")>();
  return {
    ...actual,
    loadPriceTable: vi.fn()
  };
});

const mockedLoadPriceTable = vi.mocked(loadPriceTable);

function buildRequest(body: unknown): Request {
  return new Request("http://localhost/api/backtests/run", {
    method: "POST",
    headers: {
      "Content-Type": "application/json"
    },
    body: JSON.stringify(body)
  });
}

function bars(points: [string, number][]): PriceBar[] {
  return points.map(([date, price]) => ({ date, open: price, close: price, adjustedClose: price }));
}

const sampleTable = buildPriceTable({
  SPY: bars([
    ["2024-01-02", 100],
    ["2024-01-03", 101],
    ["2024-02-01", 104],
    ["2024-03-01", 98]
  ]),
  QQQ: bars([
    ["2024-01-02", 200],
    ["2024-01-03", 202],
    ["2024-02-01", 210],
    ["2024-03-01", 205]
  ])
});

const validPayload = {
  startDate: "2024-01-01",
  endDate: "2024-03-31",
  initialCapital: 10000,
  monthlyContribution: 1000,
  rebalance: true,
  portfolios: [
    {
      name: "Growth",
      assets: [
        { symbol: "spy", weightPercent: 50 },
        { symbol: "QQQ", weightPercent: 50 }
      ]
    },
    {
      name: "Cautious",
      assets: [
        { symbol: "SPY", weightPercent: 60 },
        { symbol: "CASH0", weightPercent: 40 }
      ],
      withdrawalEnabled: true,
      withdrawalRatePercent: 4
    }
  ]
};

describe("POST /api/backtests/run", () => {
  beforeEach(() => {
    mockedLoadPriceTable.mockReset();
  });

  it("returns backtest results for a valid payload", async () => {
    mockedLoadPriceTable.mockResolvedValue(sampleTable);

    const response = await POST(buildRequest(validPayload));
    expect(response.status).toBe(200);

    const body = await response.json();
    expect(mockedLoadPriceTable).toHaveBeenCalledWith(["QQQ", "SPY"], "2024-01-01", "2024-03-31");
    expect(body.commonStartDate).toBe("2024-01-02");
    expect(body.firstValidDates).toEqual({ QQQ: "2024-01-02", SPY: "2024-01-02" });
    expect(body.portfolios).toHaveLength(2);
    expect(body.portfolios[0].summary.name).toBe("Growth");
    expect(body.portfolios[0].summary.totalInvested).toBe(13000);
    expect(body.portfolios[0].history).toHaveLength(4);
    expect(body.portfolios[0].monthly).toHaveLength(3);
    expect(body.portfolios[1].summary.totalWithdrawn).toBeGreaterThan(0);
  });

  it("returns 400 when weights do not sum to 100", async () => {
    const payload = {
      ...validPayload,
      portfolios: [
        {
          name: "Overweight",
          assets: [
            { symbol: "SPY", weightPercent: 60 },
            { symbol: "QQQ", weightPercent: 50 }
          ]
        }
      ]
    };

    const response = await POST(buildRequest(payload));
    expect(response.status).toBe(400);

    const body = await response.json();
    expect(body.error).toBe("Invalid backtest request");
    expect(body.details[0].message).toBe("Asset weights must sum to 100% (got 110%)");
    expect(mockedLoadPriceTable).not.toHaveBeenCalled();
  });

  it("returns 400 when the date range is reversed", async () => {
    const payload = {
      ...validPayload,
      startDate: "2024-03-01",
      endDate: "2024-01-01"
    };

    const response = await POST(buildRequest(payload));
    expect(response.status).toBe(400);

    const body = await response.json();
    expect(String(body.details[0].message)).toContain("endDate");
  });

  it("returns 400 when a symbol is repeated", async () => {
    const payload = {
      ...validPayload,
      portfolios: [
        {
          name: "Twice",
          assets: [
            { symbol: "SPY", weightPercent: 50 },
            { symbol: "spy", weightPercent: 50 }
          ]
        }
      ]
    };

    const response = await POST(buildRequest(payload));
    expect(response.status).toBe(400);

    const body = await response.json();
    expect(body.details[0].message).toBe("Asset symbols must be unique within a portfolio");
  });

  it("returns 502 when the market data source fails", async () => {
    mockedLoadPriceTable.mockRejectedValue(new MarketDataError("upstream failure"));

    const response = await POST(buildRequest(validPayload));
    expect(response.status).toBe(502);

    const body = await response.json();
    expect(body.error).toBe("Failed to fetch market data. Please try again.");
  });

  it("returns 422 when no symbol has price data", async () => {
    mockedLoadPriceTable.mockResolvedValue(buildPriceTable({}));

    const response = await POST(buildRequest(validPayload));
    expect(response.status).toBe(422);

    const body = await response.json();
    expect(body.error).toBe("No price data returned for the requested period");
  });
});
