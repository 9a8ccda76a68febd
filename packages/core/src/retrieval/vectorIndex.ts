/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * @fileoverview In-memory nearest-neighbour index over catalog vectors.
 *
 * Vectors are L2-normalised on the way in and on the way out, so the inner
 * product used for ranking equals cosine similarity. `refresh()` builds a new
 * snapshot from the source and swaps it in once complete; a query never sees a
 * half-built index.
 *
 * Ties in score keep the order in which the source returned the records.
 */

import { debugLogger } from '../utils/debugLogger.js';
import type { EmbeddingClient } from './embeddings/index.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A stored record: its id and its vector as persisted (JSON text or array).
 */
export interface VectorRecord {
  id: number;
  vector: string | readonly number[] | null | undefined;
}

/**
 * Where an index pulls its records from on refresh.
 */
export interface VectorSource {
  readonly name: string;
  load(): Promise<VectorRecord[]>;
}

export interface VectorHit {
  id: number;
  /** Inner product of the normalised vectors, in [-1, 1] */
  score: number;
}

export interface RefreshStats {
  indexed: number;
  skipped: number;
}

interface Snapshot {
  ids: number[];
  vectors: number[][];
  dimension: number | null;
}

const EMPTY_SNAPSHOT: Snapshot = { ids: [], vectors: [], dimension: null };

// =============================================================================
// Vector helpers
// =============================================================================

/**
 * Scales `vector` to unit length. A zero vector comes back unchanged.
 */
export function normalizeL2(vector: readonly number[]): number[] {
  let sumSquares = 0;
  for (const value of vector) {
    sumSquares += value * value;
  }
  const norm = Math.sqrt(sumSquares);
  if (norm === 0) {
    return [...vector];
  }
  return vector.map((value) => value / norm);
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

/**
 * Decodes a persisted vector. Returns null for anything that is not a
 * non-empty array of finite numbers.
 */
export function parseStoredVector(raw: VectorRecord['vector']): number[] | null {
  if (raw === null || raw === undefined) {
    return null;
  }

  let decoded: unknown = raw;
  if (typeof raw === 'string') {
    if (raw.trim() === '') {
      return null;
    }
    try {
      decoded = JSON.parse(raw);
    } catch {
      return null;
    }
  }

  if (!Array.isArray(decoded) || decoded.length === 0) {
    return null;
  }
  const values: number[] = [];
  for (const value of decoded) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return null;
    }
    values.push(value);
  }
  return values;
}

// =============================================================================
// VectorIndex
// =============================================================================

export class VectorIndex {
  private snapshot: Snapshot = EMPTY_SNAPSHOT;

  constructor(
    private readonly embeddings: EmbeddingClient,
    readonly name = 'index',
  ) {}

  get size(): number {
    return this.snapshot.ids.length;
  }

  get dimension(): number | null {
    return this.snapshot.dimension;
  }

  /**
   * Rebuilds the index from `source`. Records whose vector is missing,
   * malformed, zero, or of a different dimension than the first usable one
   * are skipped.
   */
  async refresh(source: VectorSource): Promise<RefreshStats> {
    const records = await source.load();

    const next: Snapshot = { ids: [], vectors: [], dimension: null };
    let skipped = 0;

    for (const record of records) {
      const parsed = parseStoredVector(record.vector);
      if (!parsed || (next.dimension !== null && parsed.length !== next.dimension)) {
        skipped++;
        continue;
      }
      const normalized = normalizeL2(parsed);
      if (normalized.every((value) => value === 0)) {
        skipped++;
        continue;
      }
      if (next.dimension === null) {
        next.dimension = normalized.length;
      }
      next.ids.push(record.id);
      next.vectors.push(normalized);
    }

    this.snapshot = next;
    debugLogger.log(
      `[VectorIndex:${this.name}] Refreshed from ${source.name}: ${next.ids.length} indexed, ${skipped} skipped`,
    );
    return { indexed: next.ids.length, skipped };
  }

  /**
   * Top-`k` entries by descending cosine similarity.
   *
   * @throws Error when the query dimension differs from the index dimension
   */
  query(vector: readonly number[], k: number): VectorHit[] {
    const { ids, vectors, dimension } = this.snapshot;
    const limit = Math.floor(k);
    if (ids.length === 0 || limit <= 0) {
      return [];
    }
    if (vector.length !== dimension) {
      throw new Error(
        `Query dimension ${vector.length} does not match index '${this.name}' dimension ${dimension}`,
      );
    }

    const query = normalizeL2(vector);
    const hits: VectorHit[] = ids.map((id, position) => ({
      id,
      score: dot(query, vectors[position] ?? []),
    }));
    // Array.prototype.sort is stable: equal scores keep source order.
    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, limit);
  }

  /**
   * Embeds `text` and queries the index. An empty index answers without
   * calling the embedding provider.
   */
  async queryText(
    text: string,
    k: number,
    signal?: AbortSignal,
  ): Promise<VectorHit[]> {
    if (this.size === 0 || Math.floor(k) <= 0) {
      return [];
    }
    const vector = await this.embeddings.embedOne(text, signal);
    return this.query(vector, k);
  }
}
