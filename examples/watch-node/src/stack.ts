import { z } from 'zod';
import { listView, stateView } from 'liveview-core';
import type { StackDefinition } from 'liveview-core';

export const LotIdSchema = z.object({
  lot_number: z.number().optional(),
  seller: z.string().optional(),
});

export const LotStateSchema = z.object({
  title: z.string().optional(),
  highest_bid: z.number().optional(),
  closes_at: z.number().optional(),
});

export const LotMetricsSchema = z.object({
  bid_count: z.number().optional(),
  unique_bidders: z.number().optional(),
  top_bid: z.number().optional(),
});

export const LotSchema = z.object({
  id: LotIdSchema.optional(),
  state: LotStateSchema.optional(),
  metrics: LotMetricsSchema.optional(),
});

export type Lot = z.infer<typeof LotSchema>;

export const AUCTION_STACK = {
  name: 'auction-house',
  url: process.env.LIVEVIEW_URL ?? 'ws://localhost:8878',
  views: {
    Lot: {
      state: stateView<Lot>('Lot/state', {
        'metrics.bid_count': 'Count',
        'metrics.unique_bidders': 'UniqueCount',
        'metrics.top_bid': 'Max',
      }),
      list: listView<Lot>('Lot/list'),
      closingSoon: listView<Lot>('Lot/closing-soon'),
    },
  },
  schemas: {
    Lot: LotSchema,
  },
} as const satisfies StackDefinition;

export type AuctionStack = typeof AUCTION_STACK;
