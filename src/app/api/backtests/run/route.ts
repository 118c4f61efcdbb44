import { BacktestDataError, executeBacktest } from "@/lib/backtest";
import { createLogger } from "@/lib/logger";
import { backtestRequestSchema } from "@/lib/schemas/backtest";
import { MarketDataError } from "@/lib/yahoo";
import { NextResponse } from "next/server";
import { z } from "zod";

export const runtime = "nodejs";

const logger = createLogger("BacktestRoute");

export async function POST(request: Request) {
  try {
    const body: unknown = await request.json();
    const payload = backtestRequestSchema.parse(body);

    const result = await executeBacktest(payload);
    return NextResponse.json(result);
  } catch (error) {
    if (error instanceof z.ZodError) {
      return NextResponse.json(
        {
          error: "Invalid backtest request",
          details: error.issues
        },
        {
          status: 400
        }
      );
    }

    if (error instanceof MarketDataError) {
      logger.warn("Market data unavailable", { message: error.message });
      return NextResponse.json(
        {
          error: "Failed to fetch market data. Please try again."
        },
        {
          status: 502
        }
      );
    }

    if (error instanceof BacktestDataError) {
      return NextResponse.json(
        {
          error: error.message
        },
        {
          status: 422
        }
      );
    }

    logger.error("Backtest failed", {
      message: error instanceof Error ? error.message : String(error)
    });
    const message = error instanceof Error ? error.message : "Failed to run backtest";

    return NextResponse.json(
      {
        error: message
      },
      {
        status: 500
      }
    );
  }
}
