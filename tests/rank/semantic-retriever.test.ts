import { describe, it, expect, vi } from 'vitest';
import {
  EmbeddingSimilarityRetriever,
  RetrievalError,
  buildCandidateDocument,
  buildQueryDocument,
  cosineSimilarity,
  toSimilarityScore,
  type Embedder,
} from '@matchgraph/agents';
import { makeCandidate, makeObjective, makeUserProfile } from '../fixtures';

const VECTORS: Record<string, number[]> = {
  'Person a': [1, 0],
  'Person b': [0, 1],
  'Person c': [1, 1],
  'Person d': [-1, 0],
};

/** Query embeds to [1, 0]; candidates by name. */
function vectorEmbedder() {
  const embed = vi.fn(async (texts: string[]) =>
    texts.map((text) => {
      if (text.startsWith('Goal:')) return [1, 0];
      const name = /^Name: ([^.]+)\./.exec(text)?.[1] ?? '';
      return VECTORS[name] ?? [0, 0];
    }),
  );
  return { embed } satisfies Embedder;
}

const userProfile = makeUserProfile({ top_skills: [{ skill: 'python' }] });
const userObjective = makeObjective({
  target_profiles: [{ type: 'peer', titles: ['CTO', 'VP Engineering'], why: 'Scale the team' }],
  success_signals: ['climate'],
});
const candidates = ['a', 'b', 'c', 'd'].map((id) => makeCandidate(id));

describe('retrieval documents', () => {
  it('describes a candidate by the fields it has', () => {
    const doc = buildCandidateDocument(
      makeCandidate('c1', { title: 'CTO', company: 'Acme', skills: ['Go', 'SQL'] }),
    );
    expect(doc).toBe('Name: Person c1. Title: CTO. Company: Acme. Skills: Go, SQL');
  });

  it('describes the user intent as one query', () => {
    expect(buildQueryDocument(userProfile, userObjective)).toBe(
      'Goal: Find a technical co-founder. Seeking: CTO, VP Engineering — Scale the team. ' +
        'Success signals: climate. User skills: python',
    );
  });
});

describe('similarity math', () => {
  it('computes cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
    expect(cosineSimilarity([1, 2], [1])).toBe(0);
  });

  it('scales to 0-100 with four decimals and floors negatives', () => {
    expect(toSimilarityScore(0.7071067811865475)).toBe(70.7107);
    expect(toSimilarityScore(-0.4)).toBe(0);
    expect(toSimilarityScore(1)).toBe(100);
  });
});

describe('EmbeddingSimilarityRetriever', () => {
  it('ranks only the top-K candidates by similarity', async () => {
    const retriever = new EmbeddingSimilarityRetriever(vectorEmbedder(), { topK: 2 });

    const scores = await retriever.retrieve(userProfile, userObjective, candidates);

    expect([...scores.entries()]).toEqual([
      ['a', { similarity: 100, rank: 1 }],
      ['c', { similarity: 70.7107, rank: 2 }],
    ]);
  });

  it('ranks everyone when top-K exceeds the candidate count', async () => {
    const retriever = new EmbeddingSimilarityRetriever(vectorEmbedder(), { topK: 10 });

    const scores = await retriever.retrieve(userProfile, userObjective, candidates);

    expect(scores.get('b')).toEqual({ similarity: 0, rank: 3 });
    expect(scores.get('d')).toEqual({ similarity: 0, rank: 4 });
  });

  it('embeds the query and every candidate in one batch', async () => {
    const embedder = vectorEmbedder();
    const retriever = new EmbeddingSimilarityRetriever(embedder);

    await retriever.retrieve(userProfile, userObjective, candidates);

    expect(embedder.embed).toHaveBeenCalledTimes(1);
    expect(embedder.embed.mock.calls[0][0]).toHaveLength(5);
  });

  it('returns an empty map without embedding when there are no candidates', async () => {
    const embedder = vectorEmbedder();
    const retriever = new EmbeddingSimilarityRetriever(embedder);

    const scores = await retriever.retrieve(userProfile, userObjective, []);

    expect(scores.size).toBe(0);
    expect(embedder.embed).not.toHaveBeenCalled();
  });

  it('wraps embedding failures in RetrievalError', async () => {
    const retriever = new EmbeddingSimilarityRetriever({
      embed: async () => {
        throw new Error('model not found');
      },
    });

    const pending = retriever.retrieve(userProfile, userObjective, candidates);
    await expect(pending).rejects.toBeInstanceOf(RetrievalError);
    await expect(pending).rejects.toThrow('Embedding failed: model not found');
  });

  it('rejects a response with the wrong number of vectors', async () => {
    const retriever = new EmbeddingSimilarityRetriever({ embed: async () => [[1, 0]] });

    await expect(retriever.retrieve(userProfile, userObjective, candidates)).rejects.toThrow(
      'Embedding count mismatch: expected 5, got 1',
    );
  });

  describe('warmUp', () => {
    it('becomes ready after loading the model', async () => {
      const embedder = vectorEmbedder();
      const retriever = new EmbeddingSimilarityRetriever(embedder);

      expect(retriever.isReady()).toBe(false);
      await retriever.warmUp();

      expect(retriever.isReady()).toBe(true);
      expect(embedder.embed).toHaveBeenCalledWith(['warm-up']);
    });

    it('logs a failed warm-up and still reports ready', async () => {
      const log = vi.fn();
      const retriever = new EmbeddingSimilarityRetriever(
        {
          embed: async () => {
            throw new Error('offline');
          },
        },
        { log },
      );

      await retriever.warmUp();

      expect(retriever.isReady()).toBe(true);
      expect(log).toHaveBeenCalledWith('warn', 'Embedding model warm-up failed', {
        error: 'offline',
      });
    });
  });
});
