import { z } from "zod";

export const TournamentStatusSchema = z.enum(["active", "ended", "upcoming"]);
export type TournamentStatus = z.infer<typeof TournamentStatusSchema>;

export const TournamentSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  entryFee: z.number().nonnegative(),
  prizePool: z.number().nonnegative(),
  participants: z.number().int().nonnegative(),
  status: TournamentStatusSchema
});
export type Tournament = z.infer<typeof TournamentSchema>;

/** Tournament row as the broker sends it (snake_case, ids may be numeric). */
export const BrokerTournamentSchema = z
  .object({
    id: z.union([z.string().min(1), z.number()]),
    name: z.string().min(1),
    entry_fee: z.coerce.number().nonnegative(),
    prize_pool: z.coerce.number().nonnegative().default(0),
    participants: z.coerce.number().int().nonnegative().default(0),
    status: TournamentStatusSchema.catch("ended")
  })
  .transform(
    (row): Tournament => ({
      id: String(row.id),
      name: row.name,
      entryFee: row.entry_fee,
      prizePool: row.prize_pool,
      participants: row.participants,
      status: row.status
    })
  );

export const TradeDirectionSchema = z.enum(["call", "put"]);
export type TradeDirection = z.infer<typeof TradeDirectionSchema>;

export const PendingTradeStatusSchema = z.enum(["pending", "won", "lost", "expired"]);
export type PendingTradeStatus = z.infer<typeof PendingTradeStatusSchema>;

export const PendingTradeSchema = z.object({
  id: z.string().min(1),
  asset: z.string().min(1),
  direction: TradeDirectionSchema,
  amount: z.number().positive(),
  confidence: z.number().min(0).max(1),
  openedAt: z.string().min(1),
  expirationEpoch: z.number().int(),
  status: PendingTradeStatusSchema
});
export type PendingTrade = z.infer<typeof PendingTradeSchema>;

export const TradeOutcomeSchema = z.enum(["win", "loss"]);
export type TradeOutcome = z.infer<typeof TradeOutcomeSchema>;

export const TradeRecordSchema = PendingTradeSchema.omit({ status: true }).extend({
  outcome: TradeOutcomeSchema,
  resolvedAt: z.string().min(1)
});
export type TradeRecord = Readonly<z.infer<typeof TradeRecordSchema>>;

export const CandleSchema = z.object({
  time: z.number().int(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number()
});
export type Candle = z.infer<typeof CandleSchema>;
