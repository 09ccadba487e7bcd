import { z } from 'zod';
import { LiveViewClient } from 'liveview-core';
import { AUCTION_STACK, LotIdSchema, LotSchema } from './stack';

const LotWithIdSchema = LotSchema.extend({
  id: LotIdSchema.required(),
});

type LotWithId = z.infer<typeof LotWithIdSchema>;

function printLot(lot: LotWithId) {
  console.log(`\n=== Lot #${lot.id.lot_number ?? 'N/A'} ===`);
  console.log(`Title: ${lot.state?.title ?? 'N/A'}`);
  console.log(`Seller: ${lot.id.seller ?? 'N/A'}`);
  console.log(`Highest Bid: ${lot.state?.highest_bid ?? 'N/A'}`);
  console.log(`Closes At: ${lot.state?.closes_at ?? 'N/A'}`);
  console.log(`Bids: ${lot.metrics?.bid_count ?? 0} from ${lot.metrics?.unique_bidders ?? 0} bidders`);
  console.log();
}

async function main() {
  const client = await LiveViewClient.connect(AUCTION_STACK, { validateFrames: true });

  client.onConnectionStateChange((state, error) => {
    console.log(`[connection] ${state}${error ? ` (${error})` : ''}`);
  });

  const shutdown = new AbortController();
  process.once('SIGINT', () => {
    shutdown.abort();
    client.disconnect();
  });

  console.log('--- Streaming lots closing soon ---\n');

  const streamLots = async () => {
    for await (const lot of client.views.Lot.closingSoon.use({
      take: 5,
      schema: LotWithIdSchema,
      signal: shutdown.signal,
    })) {
      printLot(lot);
    }
  };

  const streamBids = async () => {
    for await (const change of client.views.Lot.list.watchRich({ signal: shutdown.signal })) {
      if (change.type === 'updated') {
        const before = change.before.metrics?.bid_count ?? 0;
        const after = change.after.metrics?.bid_count ?? 0;
        if (after !== before) {
          console.log(`Lot ${change.key}: bids ${before} -> ${after}`);
        }
      }
    }
  };

  await Promise.all([streamLots(), streamBids()]);
}

main().catch((err) => {
  console.error('Error:', err);
  process.exit(1);
});
