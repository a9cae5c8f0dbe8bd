/**
 * Vector: embedding contract, vector store contract, SQLite store and math helpers.
 */

export type { EmbeddingClient, EmbedResult } from './embedding-client.js'
export {
  packFloat32,
  unpackFloat32,
  cosineSimilarity,
  cosineDistance,
  euclideanDistance,
  l2Normalize,
} from './math.js'
export { VectorMetadataSchema, VectorRecordTypeSchema } from './vector-store.js'
export type { VectorStore, VectorMetadata, VectorMatch, VectorWhere, VectorRecordType } from './vector-store.js'
export { SqliteVectorStore } from './sqlite-vector-store.js'
export { caseDocument, articleDocument, preview } from './documents.js'
export type { VectorDocument } from './documents.js'
