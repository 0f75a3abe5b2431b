/**
 * ArangoDB Database Setup and Client
 */

import { Database } from 'arangojs';
import { z } from 'zod';
import type { AppConfig } from './config';
import { EMBEDDING_MODELS } from './embeddings';
import { errorMessage } from './errors';
import { logger } from './logger';
import type { EmbeddingModelType } from './types';

const log = logger.child({ module: 'db' });

/** Create ArangoDB database connection */
export function createDatabase(config: AppConfig['arangodb']): Database {
  return new Database({
    url: config.url,
    databaseName: config.databaseName,
    auth: {
      username: config.username,
      password: config.password,
    },
  });
}

/** Collection names */
export const COLLECTIONS = {
  recipes: 'recipes',
  embeddings: 'recipe_embeddings',
} as const;

/** Index definitions */
const INDEXES = {
  recipes: [
    {
      type: 'persistent' as const,
      fields: ['content_hash'],
      name: 'idx_content_hash',
      unique: true,
    },
    {
      type: 'persistent' as const,
      fields: ['created_at'],
      name: 'idx_created_at',
    },
  ],
  embeddings: [
    {
      type: 'persistent' as const,
      fields: ['embedding_type'],
      name: 'idx_embedding_type',
    },
    {
      type: 'persistent' as const,
      fields: ['recipe_id', 'embedding_type'],
      name: 'idx_recipe_embedding_type',
      unique: true,
    },
  ],
};

/** Setup recipe collections and indexes */
export async function setupRecipeStore(db: Database): Promise<void> {
  log.info('Setting up recipe collections...');

  for (const name of Object.values(COLLECTIONS)) {
    const collection = db.collection(name);
    if (!(await collection.exists())) {
      await collection.create();
      log.info(`Created collection: ${name}`);
    } else {
      log.debug(`Collection exists: ${name}`);
    }
  }

  const targets = [
    { name: COLLECTIONS.recipes, indexes: INDEXES.recipes },
    { name: COLLECTIONS.embeddings, indexes: INDEXES.embeddings },
  ];
  for (const { name, indexes } of targets) {
    const collection = db.collection(name);
    for (const indexDef of indexes) {
      try {
        await collection.ensureIndex(indexDef);
        log.debug(`Index ensured: ${name}.${indexDef.name}`);
      } catch (err) {
        if (!errorMessage(err).includes('duplicate')) {
          throw err;
        }
      }
    }
  }

  log.info('Recipe store setup complete.');
}

/** Drop recipe collections (for testing/reset) */
export async function dropRecipeStore(db: Database): Promise<void> {
  for (const name of Object.values(COLLECTIONS)) {
    const collection = db.collection(name);
    if (await collection.exists()) {
      await collection.drop();
      log.info(`Dropped collection: ${name}`);
    }
  }
}

/** Vector index tuning; see ArangoDB's IVF vector index parameters */
export interface VectorIndexOptions {
  nLists?: number;
  metric?: 'cosine' | 'l2' | 'innerProduct';
  defaultNProbe?: number;
  trainingIterations?: number;
}

export const VECTOR_INDEX_NAME = 'idx_embedding_vector';

/** Index definition for `recipe_embeddings.embedding`; nLists defaults to about N/15 */
export function vectorIndexDefinition(
  documentCount: number,
  dimension: number,
  options: VectorIndexOptions = {}
) {
  return {
    type: 'vector',
    name: VECTOR_INDEX_NAME,
    fields: ['embedding'],
    params: {
      metric: options.metric ?? 'cosine',
      dimension,
      nLists: options.nLists ?? Math.max(1, Math.floor(documentCount / 15)),
      defaultNProbe: options.defaultNProbe ?? 10,
      trainingIterations: options.trainingIterations ?? 25,
    },
  };
}

const indexListingSchema = z.object({
  indexes: z.array(
    z.object({
      type: z.string(),
      name: z.string().optional(),
      fields: z.array(z.string()).optional(),
    })
  ),
});

/** Name of the vector index over `embedding` in an `/_api/index` listing */
export function findVectorIndex(listing: unknown): string | null {
  const parsed = indexListingSchema.safeParse(listing);
  if (!parsed.success) return null;
  const index = parsed.data.indexes.find(
    (idx) => idx.type === 'vector' && (idx.fields ?? []).includes('embedding')
  );
  return index ? (index.name ?? VECTOR_INDEX_NAME) : null;
}

async function listEmbeddingIndexes(db: Database): Promise<unknown> {
  const response = await db.route('/_api/index').get({ collection: COLLECTIONS.embeddings });
  return response.body;
}

/**
 * Create the vector index on stored embeddings. The index is trained on
 * existing documents, so an empty collection is skipped. ArangoDB 3.12.4+
 * then serves the `COSINE_SIMILARITY` lookups from it.
 */
export async function createVectorIndex(
  db: Database,
  model: EmbeddingModelType,
  options: VectorIndexOptions = {}
): Promise<boolean> {
  const embeddingsCol = db.collection(COLLECTIONS.embeddings);

  try {
    const { count } = await embeddingsCol.count();
    if (count === 0) {
      log.warn('No embeddings to train the vector index on; add recipes first');
      return false;
    }

    const existing = findVectorIndex(await listEmbeddingIndexes(db));
    if (existing) {
      log.info(`Vector index already exists: ${existing}`);
      return true;
    }

    const definition = vectorIndexDefinition(count, EMBEDDING_MODELS[model].dimension, options);
    log.info(
      { nLists: definition.params.nLists, documents: count },
      'Creating vector index...'
    );
    await db.route('/_api/index').post(definition, { collection: COLLECTIONS.embeddings });
    log.info(`Vector index created: ${COLLECTIONS.embeddings}.${VECTOR_INDEX_NAME}`);
    return true;
  } catch (err) {
    log.error({ err: errorMessage(err) }, 'Failed to create vector index');
    return false;
  }
}

/** Check if the vector index exists */
export async function hasVectorIndex(db: Database): Promise<boolean> {
  try {
    return findVectorIndex(await listEmbeddingIndexes(db)) !== null;
  } catch (err) {
    log.warn({ err: errorMessage(err) }, 'Could not list embedding indexes');
    return false;
  }
}
