import type { SearchMatch } from "@voicekb/types";
import type { IEmbeddingProvider } from "@voicekb/embeddings";
import type { VectorIndexWriter } from "@voicekb/vector-store";
import type { Logger } from "@voicekb/logger";
import { ValidationError } from "@voicekb/errors";

export interface KnowledgeBaseDependencies {
  embeddingProvider: IEmbeddingProvider;
  writer: VectorIndexWriter;
  logger?: Logger;
}

export interface SearchRequest {
  namespaceId: string;
  query: string;
  /** Default: 5 */
  topK?: number;
}

/**
 * Query -> Embed -> Vector Search
 *
 * Matches come back in the index's own order; nothing is re-ranked here.
 */
export async function searchKnowledgeBase(
  request: SearchRequest,
  deps: KnowledgeBaseDependencies,
): Promise<SearchMatch[]> {
  const query = request.query.trim();
  if (query === "") {
    throw new ValidationError("Search query is empty", { query: "must not be empty" });
  }
  const topK = request.topK ?? 5;
  if (!Number.isInteger(topK) || topK < 1) {
    throw new ValidationError("Invalid topK", { topK: "must be a positive integer" });
  }

  const embeddingResult = await deps.embeddingProvider.embed(query);
  const queryVector = embeddingResult.embeddings[0];
  if (!queryVector) {
    throw new Error("Failed to generate embedding for query");
  }

  const matches = await deps.writer.search(request.namespaceId, queryVector, topK);
  deps.logger?.debug(
    { namespaceId: request.namespaceId, topK, matches: matches.length },
    "Knowledge base searched",
  );
  return matches;
}

/** Delete every indexed chunk of one document. Returns the number of chunks removed. */
export async function removeDocument(
  request: { namespaceId: string; fileId: string },
  deps: Pick<KnowledgeBaseDependencies, "writer">,
): Promise<number> {
  return deps.writer.deleteDocument(request.namespaceId, request.fileId);
}
