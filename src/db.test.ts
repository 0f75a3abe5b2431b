import { describe, expect, test } from 'vitest';
import { findVectorIndex, VECTOR_INDEX_NAME, vectorIndexDefinition } from './db';
import { EMBEDDING_MODELS } from './embeddings';

describe('vectorIndexDefinition', () => {
  test('sizes nLists from the document count', () => {
    expect(vectorIndexDefinition(300, 1536)).toEqual({
      type: 'vector',
      name: VECTOR_INDEX_NAME,
      fields: ['embedding'],
      params: {
        metric: 'cosine',
        dimension: 1536,
        nLists: 20,
        defaultNProbe: 10,
        trainingIterations: 25,
      },
    });
  });

  test('keeps at least one list', () => {
    expect(vectorIndexDefinition(5, 1536).params.nLists).toBe(1);
  });

  test('takes the dimension of the embedding model', () => {
    const dimension = EMBEDDING_MODELS['text-embedding-3-large'].dimension;
    expect(vectorIndexDefinition(30, dimension).params.dimension).toBe(3072);
  });

  test('applies overrides', () => {
    const { params } = vectorIndexDefinition(300, 1536, {
      nLists: 8,
      metric: 'l2',
      defaultNProbe: 4,
      trainingIterations: 5,
    });
    expect(params).toEqual({
      metric: 'l2',
      dimension: 1536,
      nLists: 8,
      defaultNProbe: 4,
      trainingIterations: 5,
    });
  });
});

describe('findVectorIndex', () => {
  test('finds the vector index over embeddings', () => {
    const listing = {
      error: false,
      indexes: [
        { id: 'recipe_embeddings/0', type: 'primary', name: 'primary', fields: ['_key'] },
        { id: 'recipe_embeddings/7', type: 'vector', name: 'idx_embedding_vector', fields: ['embedding'] },
      ],
    };
    expect(findVectorIndex(listing)).toBe('idx_embedding_vector');
  });

  test('ignores vector indexes on other fields', () => {
    const listing = { indexes: [{ type: 'vector', name: 'other', fields: ['summary_vec'] }] };
    expect(findVectorIndex(listing)).toBeNull();
  });

  test('returns null for an unexpected response body', () => {
    expect(findVectorIndex(undefined)).toBeNull();
    expect(findVectorIndex({ indexes: 'none' })).toBeNull();
  });
});
