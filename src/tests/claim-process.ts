// Child process for the concurrent claim test: opens the queue, reports
// "ready", calls claimNext once on "go" and sends back what it got.

import { JobQueue } from '../queue/store.js';

const dbPath = process.argv[2];
if (!dbPath || !process.send) {
  throw new Error('Usage: fork claim-process.ts <db path> with an IPC channel');
}

const queue = new JobQueue(dbPath);

process.once('message', () => {
  let claimed: number | null;
  try {
    claimed = queue.claimNext()?.id ?? null;
  } finally {
    queue.close();
  }
  process.send?.({ claimed }, undefined, {}, () => process.disconnect());
});

process.send?.('ready');
