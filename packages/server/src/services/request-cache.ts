import type { Choice, EpisodeGuideTemplate, PodcastRole } from '@showdesk/shared';

function memoize<K, V>(store: Map<K, V>, key: K, load: () => V): V {
  if (store.has(key)) {
    const cached = store.get(key);
    if (cached !== undefined) {
      return cached;
    }
  }
  const value = load();
  store.set(key, value);
  return value;
}

/**
 * Lookups repeated within one request. A new instance is created for every
 * request, so nothing here outlives the response.
 */
export class RequestCache {
  private roles = new Map<string, PodcastRole | null>();
  private templates = new Map<number, EpisodeGuideTemplate | null>();
  private choices = new Map<string, Choice[]>();

  podcastRole(
    podcastId: number,
    userId: number,
    load: () => PodcastRole | null
  ): PodcastRole | null {
    return memoize(this.roles, `${podcastId}:${userId}`, load);
  }

  template(templateId: number, load: () => EpisodeGuideTemplate | null): EpisodeGuideTemplate | null {
    return memoize(this.templates, templateId, load);
  }

  choiceList(key: string, load: () => Choice[]): Choice[] {
    return memoize(this.choices, key, load);
  }
}
