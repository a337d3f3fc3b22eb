/**
 * Basic usage of the Pinecone REST client.
 *
 * Reads PINECONE_API_KEY, PINECONE_ENVIRONMENT and PINECONE_INDEX_NAME.
 */

import { ApiError, Client, LogLevel, createLogger } from '../src/index.js';

async function main(): Promise<void> {
  const client = await Client.fromEnv({
    logger: createLogger({ level: LogLevel.Debug }),
  });
  const index = client.index(process.env.PINECONE_INDEX_NAME ?? 'example-index');

  const { database, status } = await index.describe();
  console.log(`Index ${database.name}: ${database.dimension} dims, ${database.metric}, ${status.state}`);

  const upserted = await index.upsert('examples', [
    { id: 'A', values: new Array<number>(database.dimension).fill(0.5), metadata: { genre: 'drama' } },
    { id: 'B', values: new Array<number>(database.dimension).fill(0.25), metadata: { genre: 'comedy' } },
  ]);
  console.log(`Upserted ${upserted.upsertedCount} vectors`);

  const fetched = await index.fetch({ ids: ['A', 'B'], namespace: 'examples' });
  console.log(`Fetched ${Object.keys(fetched.vectors).join(', ')}`);

  const results = await index.query({
    namespace: 'examples',
    id: 'A',
    topK: 2,
    includeMetadata: true,
    filter: { genre: { $in: ['drama', 'comedy'] } },
  });
  for (const match of results.matches) {
    console.log(`${match.id}: ${match.score}`);
  }

  await index.update({ id: 'B', setMetadata: { genre: 'thriller' }, namespace: 'examples' });

  const stats = await index.describeStats();
  console.log(`Total vectors: ${stats.totalVectorCount}`);

  // Serverless and starter indexes reject configuration changes with a 400.
  try {
    console.log(await index.configure(1, 's1.x1'));
  } catch (error) {
    if (error instanceof ApiError && error.status === 400) {
      console.log(`Configuration rejected: ${error.message}`);
    } else {
      throw error;
    }
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
