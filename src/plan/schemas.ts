import { z } from 'zod';
import { CONVICTION_LEVELS, TRADE_DIRECTIONS } from '@/plan/types.ts';

const trimmed = z.string().trim();

const priceLevelSchema = z.object({
  price: z.number().finite().positive(),
  label: trimmed.default(''),
});

export const analystReplySchema = z.object({
  direction: z.enum(TRADE_DIRECTIONS),
  conviction: z.enum(CONVICTION_LEVELS),
  technicalFactors: z.object({
    trend: trimmed.default(''),
    keyLevels: z.array(priceLevelSchema).default([]),
    patternNotes: trimmed.default(''),
  }),
  fundamentalFactors: z
    .object({
      news: trimmed.default(''),
      macro: trimmed.default(''),
      sector: trimmed.default(''),
    })
    .nullish(),
  keyObservations: z.array(trimmed).default([]),
  rationale: trimmed.min(1, 'rationale must not be empty'),
});

export type AnalystReply = z.infer<typeof analystReplySchema>;

export const traderReplySchema = z.object({
  direction: z.enum(TRADE_DIRECTIONS),
  entry: z.number().finite().positive(),
  stopLoss: z.number().finite().positive(),
  takeProfits: z.array(z.number().finite().positive()).min(1, 'at least one take-profit is required'),
  chartStructure: trimmed.default(''),
  rationale: trimmed.min(1, 'rationale must not be empty'),
});

export type TraderReply = z.infer<typeof traderReplySchema>;

export const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
