/**
 * Unit tests for IndexClient
 *
 * Every operation runs against the msw stand-in and is checked for its verb,
 * URL, body, expected status and decoded result.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { http, HttpResponse } from 'msw';
import type { IndexClient } from '../src/client/index-client.js';
import {
  ApiError,
  DecodeError,
  TransportError,
  UseAfterDeleteError,
} from '../src/errors/index.js';
import type { Vector } from '../src/types/vector.js';
import { connectTestClient } from './support/client.js';
import {
  API_KEY,
  CONTROLLER_URL,
  INDEX,
  INDEX_URL,
  record,
  server,
  type RecordedRequest,
} from './support/server.js';

const DESCRIPTION_BODY = {
  database: {
    name: INDEX,
    metric: 'cosine',
    dimension: 3,
    replicas: 1,
    shards: 1,
    pods: 1,
    pod_type: 'p1.x1',
    metadata_config: null,
  },
  status: {
    waiting: [],
    crashed: [],
    host: `${INDEX}-proj123.svc.us-test1-gcp.pinecone.io`,
    port: 433,
    state: 'Ready',
    ready: true,
  },
};

describe('IndexClient', () => {
  let index: IndexClient;
  let requests: RecordedRequest[];

  beforeEach(async () => {
    requests = [];
    const client = await connectTestClient();
    index = client.index(INDEX);
  });

  describe('url', () => {
    it('should derive the data-plane URL from name, project and environment', () => {
      expect(index.url()).toBe('https://movies-proj123.svc.us-test1-gcp.pinecone.io');
    });

    it('should not end with a slash', () => {
      expect(index.url().endsWith('/')).toBe(false);
    });
  });

  describe('describe', () => {
    it('should GET the controller database path and decode the description', async () => {
      server.use(
        http.get(`${CONTROLLER_URL}/databases/${INDEX}`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.json(DESCRIPTION_BODY);
        })
      );

      const description = await index.describe();

      expect(description).toEqual({
        database: {
          name: 'movies',
          metric: 'cosine',
          dimension: 3,
          replicas: 1,
          shards: 1,
          pods: 1,
          podType: 'p1.x1',
          metadataConfig: undefined,
        },
        status: {
          waiting: [],
          crashed: [],
          host: 'movies-proj123.svc.us-test1-gcp.pinecone.io',
          port: 433,
          state: 'Ready',
          ready: true,
        },
      });
      expect(requests).toHaveLength(1);
      expect(requests[0]?.method).toBe('GET');
      expect(requests[0]?.headers.get('api-key')).toBe(API_KEY);
      expect(requests[0]?.body).toBeUndefined();
    });

    it('should fail with an ApiError for a missing index', async () => {
      server.use(
        http.get(`${CONTROLLER_URL}/databases/${INDEX}`, () =>
          HttpResponse.text('Index movies not found', { status: 404 })
        )
      );

      const error = await index.describe().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect(error).not.toBeInstanceOf(TransportError);
      expect((error as ApiError).status).toBe(404);
      expect((error as ApiError).type).toBe('text/plain');
      expect((error as ApiError).message).toBe('Index movies not found');
    });

    it('should fail with a DecodeError when the description has the wrong shape', async () => {
      server.use(
        http.get(`${CONTROLLER_URL}/databases/${INDEX}`, () =>
          HttpResponse.json({ database: { name: INDEX } })
        )
      );

      await expect(index.describe()).rejects.toBeInstanceOf(DecodeError);
    });
  });

  describe('describeStats', () => {
    it('should GET /describe_index_stats on the index URL', async () => {
      server.use(
        http.get(`${INDEX_URL}/describe_index_stats`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.json({
            namespaces: { '': { vectorCount: 2 }, docs: { vectorCount: 3 } },
            dimension: 3,
            indexFullness: 0.25,
            totalVectorCount: 5,
          });
        })
      );

      const stats = await index.describeStats();

      expect(stats).toEqual({
        namespaces: { '': { vectorCount: 2 }, docs: { vectorCount: 3 } },
        dimension: 3,
        indexFullness: 0.25,
        totalVectorCount: 5,
      });
      expect(requests[0]?.method).toBe('GET');
      expect(requests[0]?.url).toBe(`${INDEX_URL}/describe_index_stats`);
    });

    it('should fill in zero values the service omits', async () => {
      server.use(
        http.get(`${INDEX_URL}/describe_index_stats`, () =>
          HttpResponse.json({ namespaces: { docs: {} }, dimension: 3 })
        )
      );

      const stats = await index.describeStats();

      expect(stats).toEqual({
        namespaces: { docs: { vectorCount: 0 } },
        dimension: 3,
        indexFullness: 0,
        totalVectorCount: 0,
      });
    });

    it('should fail with a TransportError when the connection fails', async () => {
      server.use(http.get(`${INDEX_URL}/describe_index_stats`, () => HttpResponse.error()));

      const error = await index.describeStats().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect((error as TransportError).type).toBe('transport_error');
      expect((error as TransportError).status).toBeUndefined();
    });

    it('should fail with a DecodeError when the body is not JSON', async () => {
      server.use(
        http.get(`${INDEX_URL}/describe_index_stats`, () => HttpResponse.text('ok', { status: 200 }))
      );

      const error = await index.describeStats().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect((error as DecodeError).status).toBe(200);
    });
  });

  describe('upsert', () => {
    it('should POST the namespace and vectors', async () => {
      server.use(
        http.post(`${INDEX_URL}/vectors/upsert`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.json({ upsertedCount: 1 });
        })
      );

      const response = await index.upsert('docs', [
        { id: 'a', values: [0.1, 0.2, 0.3], metadata: { genre: 'drama' } },
      ]);

      expect(response).toEqual({ upsertedCount: 1 });
      expect(requests[0]?.method).toBe('POST');
      expect(requests[0]?.headers.get('content-type')).toBe('application/json');
      expect(requests[0]?.body).toEqual({
        namespace: 'docs',
        vectors: [{ id: 'a', values: [0.1, 0.2, 0.3], metadata: { genre: 'drama' } }],
      });
    });

    it('should send sparse values as sparseValues', async () => {
      server.use(
        http.post(`${INDEX_URL}/vectors/upsert`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.json({ upsertedCount: 1 });
        })
      );

      await index.upsert('', [
        { id: 'h', values: [1, 0, 0], sparseValues: { indices: [4, 9], values: [0.5, 0.25] } },
      ]);

      expect(requests[0]?.body).toEqual({
        namespace: '',
        vectors: [{ id: 'h', values: [1, 0, 0], sparseValues: { indices: [4, 9], values: [0.5, 0.25] } }],
      });
    });

    it('should send an empty upsert and report a zero count', async () => {
      server.use(
        http.post(`${INDEX_URL}/vectors/upsert`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.json({});
        })
      );

      const response = await index.upsert('docs', []);

      expect(response).toEqual({ upsertedCount: 0 });
      expect(requests[0]?.body).toEqual({ namespace: 'docs', vectors: [] });
    });

    it('should surface a dimension mismatch as an ApiError with the service code', async () => {
      server.use(
        http.post(`${INDEX_URL}/vectors/upsert`, () =>
          HttpResponse.json(
            { code: 3, message: 'Vector dimension 2 does not match the dimension of the index 3', details: [] },
            { status: 400 }
          )
        )
      );

      const error = await index.upsert('docs', [{ id: 'a', values: [1, 2] }]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect((error as ApiError).status).toBe(400);
      expect((error as ApiError).type).toBe('3');
      expect((error as ApiError).message).toBe(
        'Vector dimension 2 does not match the dimension of the index 3'
      );
      expect((error as ApiError).isRetryable).toBe(false);
    });
  });

  describe('fetch', () => {
    it('should encode ids and namespace as query parameters', async () => {
      server.use(
        http.get(`${INDEX_URL}/vectors/fetch`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.json({
            vectors: { a: { id: 'a', values: [0.1, 0.2, 0.3] } },
            namespace: 'docs',
          });
        })
      );

      const response = await index.fetch({ ids: ['a'], namespace: 'docs' });

      expect(requests[0]?.method).toBe('GET');
      expect(requests[0]?.url).toBe(`${INDEX_URL}/vectors/fetch?ids=a&namespace=docs`);
      expect(response).toEqual({
        vectors: { a: { id: 'a', values: [0.1, 0.2, 0.3] } },
        namespace: 'docs',
      });
    });

    it('should key the response by unique id when ids repeat', async () => {
      const stored: Record<string, Vector> = {
        a: { id: 'a', values: [1, 0, 0] },
        b: { id: 'b', values: [0, 1, 0] },
      };
      server.use(
        http.get(`${INDEX_URL}/vectors/fetch`, async ({ request }) => {
          requests.push(await record(request));
          const ids = new URL(request.url).searchParams.getAll('ids');
          const vectors: Record<string, Vector> = {};
          for (const id of ids) {
            const vector = stored[id];
            if (vector) vectors[id] = vector;
          }
          return HttpResponse.json({ vectors, namespace: '' });
        })
      );

      const response = await index.fetch({ ids: ['a', 'a', 'b', 'missing'] });

      expect(requests[0]?.url).toBe(`${INDEX_URL}/vectors/fetch?ids=a&ids=a&ids=b&ids=missing`);
      expect(Object.keys(response.vectors).sort()).toEqual(['a', 'b']);
      expect(response.vectors.b).toEqual({ id: 'b', values: [0, 1, 0] });
    });
  });

  describe('query', () => {
    it('should POST the query and decode scored matches', async () => {
      server.use(
        http.post(`${INDEX_URL}/query`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.json({
            results: [],
            matches: [
              { id: 'a', score: 0.98, values: [], metadata: { genre: 'drama' } },
              { id: 'b' },
            ],
            namespace: 'docs',
          });
        })
      );

      const response = await index.query({
        namespace: 'docs',
        topK: 2,
        vector: [0.1, 0.2, 0.3],
        includeMetadata: true,
        filter: { genre: { $eq: 'drama' } },
      });

      expect(requests[0]?.body).toEqual({
        namespace: 'docs',
        topK: 2,
        vector: [0.1, 0.2, 0.3],
        includeMetadata: true,
        filter: { genre: { $eq: 'drama' } },
      });
      expect(response).toEqual({
        matches: [
          { id: 'a', score: 0.98, values: [], metadata: { genre: 'drama' } },
          { id: 'b', score: 0, values: [] },
        ],
        namespace: 'docs',
      });
    });

    it('should query by stored vector id', async () => {
      server.use(
        http.post(`${INDEX_URL}/query`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.json({ matches: [{ id: 'A', score: 1 }], namespace: '' });
        })
      );

      const response = await index.query({ id: 'A', topK: 1 });

      expect(requests[0]?.body).toEqual({ id: 'A', topK: 1 });
      expect(response.matches.map((m) => m.id)).toEqual(['A']);
    });

    it('should serve concurrent calls on one handle', async () => {
      server.use(
        http.post(`${INDEX_URL}/query`, async ({ request }) => {
          const body = (await request.json()) as { id: string };
          return HttpResponse.json({ matches: [{ id: body.id, score: 1 }], namespace: '' });
        })
      );

      const [first, second] = await Promise.all([
        index.query({ id: 'x', topK: 1 }),
        index.query({ id: 'y', topK: 1 }),
      ]);

      expect(first.matches[0]?.id).toBe('x');
      expect(second.matches[0]?.id).toBe('y');
    });
  });

  describe('update', () => {
    it('should POST the update request and resolve to the opaque body', async () => {
      server.use(
        http.post(`${INDEX_URL}/vectors/update`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.json({});
        })
      );

      const result = await index.update({ id: 'a', setMetadata: { genre: 'comedy' }, namespace: 'docs' });

      expect(result).toEqual({});
      expect(requests[0]?.body).toEqual({ id: 'a', setMetadata: { genre: 'comedy' }, namespace: 'docs' });
    });

    it('should report a rejected update as an ApiError with status 400', async () => {
      server.use(
        http.post(`${INDEX_URL}/vectors/update`, () =>
          HttpResponse.json({ code: 3, message: 'No values or metadata to update', details: [] }, { status: 400 })
        )
      );

      const error = await index.update({ id: 'a' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect((error as ApiError).status).toBe(400);
      expect((error as ApiError).isClientError()).toBe(true);
    });
  });

  describe('configure', () => {
    it('should PATCH replicas and pod_type and return the text message', async () => {
      server.use(
        http.patch(`${CONTROLLER_URL}/databases/${INDEX}`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.text('Index configuration accepted', { status: 202 });
        })
      );

      const message = await index.configure(1, 's1.x1');

      expect(message).toBe('Index configuration accepted');
      expect(requests[0]?.method).toBe('PATCH');
      expect(requests[0]?.body).toEqual({ replicas: 1, pod_type: 's1.x1' });
    });

    it('should report an incompatible pod type as an ApiError with status 400', async () => {
      server.use(
        http.patch(`${CONTROLLER_URL}/databases/${INDEX}`, () =>
          HttpResponse.text('Cannot change pod type of this index', { status: 400 })
        )
      );

      const error = await index.configure(1, 's1.x1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect((error as ApiError).status).toBe(400);
      expect((error as ApiError).message).toBe('Cannot change pod type of this index');
    });

    it('should treat any status other than 202 as an ApiError', async () => {
      server.use(
        http.patch(`${CONTROLLER_URL}/databases/${INDEX}`, () => HttpResponse.text('', { status: 200, statusText: 'OK' }))
      );

      const error = await index.configure(2, 'p1.x1').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect((error as ApiError).status).toBe(200);
      expect((error as ApiError).message).toBe('200 OK');
    });
  });

  describe('delete', () => {
    it('should DELETE the index and invalidate the handle', async () => {
      server.use(
        http.delete(`${CONTROLLER_URL}/databases/${INDEX}`, async ({ request }) => {
          requests.push(await record(request));
          return HttpResponse.text('', { status: 202 });
        })
      );

      const message = await index.delete();

      expect(message).toBe('');
      expect(requests[0]?.method).toBe('DELETE');
      expect(index.isDeleted).toBe(true);
    });

    it('should reject every call made after delete', async () => {
      server.use(
        http.delete(`${CONTROLLER_URL}/databases/${INDEX}`, () => HttpResponse.text('', { status: 202 }))
      );
      await index.delete();

      expect(() => index.url()).toThrow(UseAfterDeleteError);
      expect(() => index.url()).toThrow('Index handle "movies" was deleted and can no longer be used');
      await expect(index.describe()).rejects.toBeInstanceOf(UseAfterDeleteError);
      await expect(index.describeStats()).rejects.toBeInstanceOf(UseAfterDeleteError);
      await expect(index.upsert('', [])).rejects.toBeInstanceOf(UseAfterDeleteError);
      await expect(index.fetch({ ids: ['a'] })).rejects.toBeInstanceOf(UseAfterDeleteError);
      await expect(index.query({ id: 'a', topK: 1 })).rejects.toBeInstanceOf(UseAfterDeleteError);
      await expect(index.update({ id: 'a' })).rejects.toBeInstanceOf(UseAfterDeleteError);
      await expect(index.configure(1, 'p1.x1')).rejects.toBeInstanceOf(UseAfterDeleteError);
      await expect(index.delete()).rejects.toBeInstanceOf(UseAfterDeleteError);
    });

    it('should fail with a 4xx ApiError for an index that does not exist', async () => {
      server.use(
        http.delete(`${CONTROLLER_URL}/databases/${INDEX}`, () =>
          HttpResponse.text('Index movies not found', { status: 404 })
        )
      );

      const error = await index.delete().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ApiError);
      expect((error as ApiError).isClientError()).toBe(true);
      expect(index.isDeleted).toBe(true);
    });
  });

  describe('round trip', () => {
    it('should preserve dimensionality and values through upsert and fetch', async () => {
      const store = new Map<string, unknown>();
      server.use(
        http.post(`${INDEX_URL}/vectors/upsert`, async ({ request }) => {
          const body = (await request.json()) as { vectors: Array<{ id: string }> };
          for (const vector of body.vectors) store.set(vector.id, vector);
          return HttpResponse.json({ upsertedCount: body.vectors.length });
        }),
        http.get(`${INDEX_URL}/vectors/fetch`, ({ request }) => {
          const ids = new URL(request.url).searchParams.getAll('ids');
          const vectors = Object.fromEntries(ids.map((id) => [id, store.get(id)]));
          return HttpResponse.json({ vectors, namespace: 'rt' });
        })
      );

      const values = Array.from({ length: 8 }, (_, i) => (i + 1) / 7);
      await index.upsert('rt', [{ id: 'v', values, metadata: { tags: ['x', 'y'], rank: 2 } }]);
      const response = await index.fetch({ ids: ['v'], namespace: 'rt' });

      const fetched = response.vectors.v;
      expect(fetched?.values).toHaveLength(8);
      fetched?.values.forEach((value, i) => {
        expect(value).toBeCloseTo(values[i] ?? Number.NaN, 6);
      });
      expect(fetched?.metadata).toEqual({ tags: ['x', 'y'], rank: 2 });
    });
  });
});
