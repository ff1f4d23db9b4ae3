/**
 * Content-Hash Cache
 *
 * Stores serialized per-declaration results keyed by a hash of everything the
 * result depends on (file name, declaration offset, declaration text and
 * effective configuration). An unchanged declaration maps to the same key, so
 * its previous result can be reused; any change yields a new key.
 *
 * @example
 * ```typescript
 * const cache = new ContentCache({ directory: ".valuekit-cache" });
 *
 * const key = computeContentKey(fileName, String(start), text, configJson);
 * const cached = cache.get(key);
 * if (cached !== undefined) return JSON.parse(cached);
 *
 * cache.set(key, JSON.stringify(result));
 * cache.save();
 * ```
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as crypto from "node:crypto";

// =============================================================================
// Keys
// =============================================================================

/**
 * SHA-256 over the NUL-joined parts, truncated to 32 hex characters.
 */
export function computeContentKey(...parts: string[]): string {
  return crypto.createHash("sha256").update(parts.join("\0")).digest("hex").slice(0, 32);
}

// =============================================================================
// Cache Entry
// =============================================================================

interface CacheEntry {
  /** Serialized result */
  value: string;

  /** Version of the cache format (invalidates on upgrade) */
  version: string;
}

/** Current cache format version; bump to invalidate all caches */
export const CACHE_VERSION = "1";

const CACHE_FILE_NAME = "declarations.json";

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === "object" &&
    value !== null &&
    "value" in value &&
    typeof value.value === "string" &&
    "version" in value &&
    typeof value.version === "string"
  );
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
}

export interface ContentCacheOptions {
  /** Persist to `<directory>/declarations.json`; in-memory only when unset */
  directory?: string;
  /** Called when the cache file cannot be read or written */
  onError?: (message: string) => void;
}

// =============================================================================
// Cache Store
// =============================================================================

/**
 * In-memory cache with optional persistence as a single JSON file.
 */
export class ContentCache {
  private entries = new Map<string, CacheEntry>();
  private dirty = false;
  private readonly cacheFilePath: string | undefined;
  private readonly onError: (message: string) => void;

  /** Statistics for cache performance monitoring */
  public readonly stats: CacheStats = {
    hits: 0,
    misses: 0,
    evictions: 0,
  };

  constructor(options: ContentCacheOptions = {}) {
    this.cacheFilePath = options.directory
      ? path.resolve(options.directory, CACHE_FILE_NAME)
      : undefined;
    this.onError = options.onError ?? (() => undefined);
    this.load();
  }

  get(key: string): string | undefined {
    // Only current-version entries are ever held
    const entry = this.entries.get(key);
    if (entry) {
      this.stats.hits++;
      return entry.value;
    }

    this.stats.misses++;
    return undefined;
  }

  set(key: string, value: string): void {
    this.entries.set(key, { value, version: CACHE_VERSION });
    this.dirty = true;
  }

  /**
   * Persist the cache to disk. A write failure is reported through `onError`
   * and leaves the in-memory entries intact.
   */
  save(): void {
    if (!this.dirty || !this.cacheFilePath) return;

    try {
      fs.mkdirSync(path.dirname(this.cacheFilePath), { recursive: true });
      const data: Record<string, CacheEntry> = {};
      for (const [key, entry] of this.entries) {
        data[key] = entry;
      }
      fs.writeFileSync(this.cacheFilePath, JSON.stringify(data, null, 2), "utf-8");
      this.dirty = false;
    } catch (error) {
      this.onError(`could not write cache ${this.cacheFilePath}: ${String(error)}`);
    }
  }

  private load(): void {
    if (!this.cacheFilePath || !fs.existsSync(this.cacheFilePath)) return;

    try {
      const data: unknown = JSON.parse(fs.readFileSync(this.cacheFilePath, "utf-8"));
      if (typeof data !== "object" || data === null) return;
      for (const [key, entry] of Object.entries(data)) {
        if (isCacheEntry(entry) && entry.version === CACHE_VERSION) {
          this.entries.set(key, entry);
        } else {
          // Stale or malformed; rewritten without it on the next save
          this.stats.evictions++;
          this.dirty = true;
        }
      }
    } catch (error) {
      this.entries.clear();
      this.onError(`could not read cache ${this.cacheFilePath}: ${String(error)}`);
    }
  }

  /**
   * Get cache statistics as a formatted string.
   */
  getStatsString(): string {
    const total = this.stats.hits + this.stats.misses;
    const hitRate = total > 0 ? ((this.stats.hits / total) * 100).toFixed(1) : "0.0";
    return (
      `Cache: ${this.stats.hits} hits, ${this.stats.misses} misses ` +
      `(${hitRate}% hit rate), ${this.stats.evictions} evictions, ` +
      `${this.entries.size} entries`
    );
  }
}
