import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { ConfigurationError, MatchError } from './errors.js';
import type { Embedder, MatchResult, Matcher, MatcherSettings, ToolCandidate } from './types.js';

const ToolIndexEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  parameters: z.record(z.unknown()).default({}),
  embedding: z.array(z.number()),
});

const ServerIndexEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  embedding: z.array(z.number()),
  tools: z.array(ToolIndexEntrySchema).default([]),
});

export const ToolIndexSchema = z.object({
  servers: z.array(ServerIndexEntrySchema),
});

export type ToolIndex = z.infer<typeof ToolIndexSchema>;

export function cosineSimilarity(a: number[], b: number[]): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Server relevance and tool relevance reinforce each other; a tool only ranks
 * high when both its server and the tool itself match the query.
 * Negative similarities count as no match.
 */
export function combineScores(serverScore: number, toolScore: number): number {
  const s = Math.max(0, serverScore);
  const t = Math.max(0, toolScore);
  return s * t * Math.max(s, t);
}

function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`Matcher setting "${name}" must be a positive integer, got ${value}`);
  }
}

/**
 * Two-stage semantic matcher over a precomputed tool index:
 * servers are ranked first, then tools of the best servers.
 */
export class ToolMatcher implements Matcher {
  private settings: MatcherSettings | null = null;
  private index: ToolIndex | null = null;

  constructor(private embedder: Embedder) {}

  configure(settings: MatcherSettings): void {
    assertPositiveInteger('embeddingDimensions', settings.embeddingDimensions);
    assertPositiveInteger('topServers', settings.topServers);
    assertPositiveInteger('topTools', settings.topTools);
    this.settings = { ...settings };
  }

  loadIndex(path: string): void {
    if (!this.settings) {
      throw new ConfigurationError('Matcher must be configured before loading an index');
    }

    let document: unknown;
    try {
      document = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new ConfigurationError(`Failed to read tool index at ${path}`, { cause: err });
    }

    const parsed = ToolIndexSchema.safeParse(document);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first ? `${first.path.join('.')}: ${first.message}` : parsed.error.message;
      throw new ConfigurationError(`Malformed tool index at ${path} (${where})`, { cause: parsed.error });
    }

    const dimensions = this.settings.embeddingDimensions;
    parsed.data.servers.forEach((server, i) => {
      if (server.embedding.length !== dimensions) {
        throw new ConfigurationError(
          `Tool index at ${path}: servers.${i}.embedding has ${server.embedding.length} dimensions, expected ${dimensions}`
        );
      }
      server.tools.forEach((tool, j) => {
        if (tool.embedding.length !== dimensions) {
          throw new ConfigurationError(
            `Tool index at ${path}: servers.${i}.tools.${j}.embedding has ${tool.embedding.length} dimensions, expected ${dimensions}`
          );
        }
      });
    });

    this.index = parsed.data;
  }

  async match(query: string): Promise<MatchResult> {
    if (query.trim() === '') {
      throw new MatchError('Query must not be empty');
    }
    if (!this.settings || !this.index) {
      throw new MatchError('Tool index has not been loaded');
    }
    const { embeddingDimensions, topServers, topTools } = this.settings;

    const vector = await this.embedder.embed(query, embeddingDimensions);
    if (vector.length !== embeddingDimensions) {
      throw new MatchError(
        `Query embedding has ${vector.length} dimensions, expected ${embeddingDimensions}`
      );
    }

    // Array#sort is stable, so equal scores keep index order
    const servers = this.index.servers
      .map(server => ({ server, score: cosineSimilarity(vector, server.embedding) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topServers);

    const candidates: ToolCandidate[] = [];
    for (const { server, score: serverScore } of servers) {
      for (const tool of server.tools) {
        candidates.push({
          server: server.name,
          tool: tool.name,
          score: combineScores(serverScore, cosineSimilarity(vector, tool.embedding)),
          description: tool.description,
          parameters: tool.parameters,
        });
      }
    }

    return {
      query,
      candidates: candidates.sort((a, b) => b.score - a.score).slice(0, topTools),
    };
  }
}
