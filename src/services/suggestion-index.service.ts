import { SearchServiceConfig } from '../config';
import { CatalogEvent, SuggestContext, Suggestion, SuggestionType } from '../types';
import { createChildLogger } from '../utils/logger';
import { normalizeKeyword } from '../utils/text';
import { SuggestionSink } from './availability-synchronizer.service';

interface IndexedSource {
  title: string;
  artist: string;
  popularity: number;
  city: string;
}

interface Contribution {
  popularity: number;
  city: string;
}

interface Candidate {
  /** Display text, as first indexed */
  text: string;
  normalized: string;
  type: SuggestionType;
  contributors: Map<string, Contribution>;
}

function candidateKey(type: SuggestionType, normalized: string): string {
  return `${type}|${normalized}`;
}

/**
 * Every prefix of the full text and of each word-start suffix, up to
 * `maxLength` characters.
 */
export function prefixesOf(normalized: string, maxLength: number): Set<string> {
  const prefixes = new Set<string>();
  const starts = [0];
  for (let i = 1; i < normalized.length; i++) {
    if (normalized[i - 1] === ' ' && normalized[i] !== ' ') starts.push(i);
  }
  for (const start of starts) {
    const end = Math.min(normalized.length, start + maxLength);
    for (let i = start + 1; i <= end; i++) {
      prefixes.add(normalized.slice(start, i));
    }
  }
  return prefixes;
}

function matchesPrefix(normalized: string, prefix: string): boolean {
  return normalized.startsWith(prefix) || normalized.includes(` ${prefix}`);
}

/**
 * Prefix autocomplete over event titles and artist names.
 *
 * Only title, artist, popularity and city feed the index, so availability
 * churn never touches it. Candidates are shared by every event with the same
 * normalized text and type; a candidate's weight is the highest popularity
 * among the events contributing to it.
 */
export class SuggestionIndex implements SuggestionSink {
  private sources: Map<string, IndexedSource> = new Map();
  private candidates: Map<string, Candidate> = new Map();
  private prefixes: Map<string, Set<string>> = new Map();
  private reindexed = 0;
  private logger = createChildLogger({ component: 'suggestion-index' });

  constructor(private readonly settings: SearchServiceConfig['suggest']) {}

  upsert(event: CatalogEvent): void {
    const next: IndexedSource = {
      title: event.title.trim(),
      artist: event.artist.trim(),
      popularity: event.popularityScore,
      city: normalizeKeyword(event.venue.city),
    };
    const previous = this.sources.get(event.id);
    if (
      previous &&
      previous.title === next.title &&
      previous.artist === next.artist &&
      previous.popularity === next.popularity &&
      previous.city === next.city
    ) {
      return;
    }

    if (previous) {
      this.detach(event.id, previous);
    }
    this.sources.set(event.id, next);
    this.attach(event.id, 'event', next.title, next);
    this.attach(event.id, 'artist', next.artist, next);
    this.reindexed++;
  }

  remove(eventId: string): void {
    const previous = this.sources.get(eventId);
    if (!previous) return;
    this.detach(eventId, previous);
    this.sources.delete(eventId);
  }

  suggest(prefix: string, context: SuggestContext = {}): Suggestion[] {
    const normalized = normalizeKeyword(prefix);
    if (normalized.length === 0) return [];

    const keys = this.prefixes.get(normalized.slice(0, this.settings.maxPrefixLength));
    if (!keys) return [];

    const limit = Math.min(Math.max(1, context.limit ?? this.settings.defaultLimit), this.settings.maxLimit);
    const city = context.city !== undefined ? normalizeKeyword(context.city) : undefined;
    const longPrefix = normalized.length > this.settings.maxPrefixLength;

    const results: Suggestion[] = [];
    for (const key of keys) {
      const candidate = this.candidates.get(key);
      if (!candidate) continue;
      if (context.types && !context.types.includes(candidate.type)) continue;
      if (longPrefix && !matchesPrefix(candidate.normalized, normalized)) continue;

      let weight: number | undefined;
      for (const contribution of candidate.contributors.values()) {
        if (city !== undefined && contribution.city !== city) continue;
        if (weight === undefined || contribution.popularity > weight) {
          weight = contribution.popularity;
        }
      }
      if (weight === undefined) continue;

      results.push({ text: candidate.text, type: candidate.type, score: weight });
    }

    return results
      .sort((a, b) => b.score - a.score || (a.text < b.text ? -1 : a.text > b.text ? 1 : 0) || (a.type < b.type ? -1 : 1))
      .slice(0, limit);
  }

  /** Number of times an event was (re)indexed */
  get reindexCount(): number {
    return this.reindexed;
  }

  get size(): number {
    return this.candidates.size;
  }

  private attach(eventId: string, type: SuggestionType, text: string, source: IndexedSource): void {
    const normalized = normalizeKeyword(text);
    if (normalized.length === 0) return;

    const key = candidateKey(type, normalized);
    let candidate = this.candidates.get(key);
    if (!candidate) {
      candidate = { text, normalized, type, contributors: new Map() };
      this.candidates.set(key, candidate);
      for (const prefix of prefixesOf(normalized, this.settings.maxPrefixLength)) {
        let keys = this.prefixes.get(prefix);
        if (!keys) {
          keys = new Set();
          this.prefixes.set(prefix, keys);
        }
        keys.add(key);
      }
    }
    candidate.contributors.set(eventId, { popularity: source.popularity, city: source.city });
  }

  private detach(eventId: string, source: IndexedSource): void {
    const entries: Array<[SuggestionType, string]> = [['event', source.title], ['artist', source.artist]];
    for (const [type, text] of entries) {
      const normalized = normalizeKeyword(text);
      const key = candidateKey(type, normalized);
      const candidate = this.candidates.get(key);
      if (!candidate) continue;

      candidate.contributors.delete(eventId);
      if (candidate.contributors.size > 0) continue;

      this.candidates.delete(key);
      for (const prefix of prefixesOf(normalized, this.settings.maxPrefixLength)) {
        const keys = this.prefixes.get(prefix);
        keys?.delete(key);
        if (keys && keys.size === 0) {
          this.prefixes.delete(prefix);
        }
      }
      this.logger.debug({ type, text: candidate.text }, 'Suggestion candidate dropped');
    }
  }
}
