export const SEARCH_TYPES = ['web', 'news', 'images', 'videos'] as const;

export type SearchType = typeof SEARCH_TYPES[number];
