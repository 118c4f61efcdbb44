import { isIsoDate } from "@/lib/calendar";
import { z } from "zod";

const isoDateRegex = /^\d{4}-\d{2}-\d{2}$/;

const assetSchema = z.object({
  symbol: z.string().trim().min(1).max(12).transform((value) => value.toUpperCase()),
  weightPercent: z.number().int().min(0).max(100)
});

const portfolioSchema = z
  .object({
    name: z.string().trim().min(1).max(60),
    assets: z.array(assetSchema).min(1).max(20),
    withdrawalEnabled: z.boolean().default(false),
    withdrawalRatePercent: z.number().min(0).max(100).default(4),
    inflationRatePercent: z.number().min(0).max(100).default(2),
    withdrawalStartYear: z.number().int().min(1).default(1)
  })
  .superRefine((value, context) => {
    const totalWeight = value.assets.reduce((sum, asset) => sum + asset.weightPercent, 0);
    if (totalWeight !== 100) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Asset weights must sum to 100% (got ${totalWeight}%)`,
        path: ["assets"]
      });
    }

    const uniqueSymbolCount = new Set(value.assets.map((asset) => asset.symbol)).size;
    if (uniqueSymbolCount !== value.assets.length) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Asset symbols must be unique within a portfolio",
        path: ["assets"]
      });
    }
  });

export const backtestRequestSchema = z
  .object({
    startDate: z.string().regex(isoDateRegex, "startDate must be YYYY-MM-DD"),
    endDate: z.string().regex(isoDateRegex, "endDate must be YYYY-MM-DD"),
    initialCapital: z.number().min(0).default(0),
    monthlyContribution: z.number().min(0).default(2000),
    rebalance: z.boolean().default(true),
    portfolios: z.array(portfolioSchema).min(1).max(10)
  })
  .superRefine((value, context) => {
    if (!isIsoDate(value.startDate) || !isIsoDate(value.endDate) || value.startDate >= value.endDate) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "endDate must be after startDate",
        path: ["endDate"]
      });
    }

    const uniqueNameCount = new Set(value.portfolios.map((portfolio) => portfolio.name)).size;
    if (uniqueNameCount !== value.portfolios.length) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Portfolio names must be unique",
        path: ["portfolios"]
      });
    }
  });

export type BacktestRequestInput = z.infer<typeof backtestRequestSchema>;
