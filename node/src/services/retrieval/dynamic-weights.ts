// src/services/retrieval/dynamic-weights.ts: query-dependent facet weights and embedding hints
import type { FacetWeights, QueryComponents } from '@/types/core';

export type RetrievalFocus = 'general' | 'location' | 'service' | 'target' | 'content';

/** Below this overall confidence a facet-specific focus is not trusted. */
export const MIN_FOCUS_CONFIDENCE = 0.1;

// Each row sums to 1; `combined` never drops below 0.2.
export const FOCUS_WEIGHTS: Record<RetrievalFocus, Readonly<FacetWeights>> = {
  general: { content: 0.3, location: 0.2, service: 0.2, target: 0.1, combined: 0.2 },
  location: { content: 0.2, location: 0.4, service: 0.1, target: 0.1, combined: 0.2 },
  service: { content: 0.2, location: 0.1, service: 0.4, target: 0.1, combined: 0.2 },
  target: { content: 0.2, location: 0.1, service: 0.1, target: 0.4, combined: 0.2 },
  content: { content: 0.5, location: 0.1, service: 0.1, target: 0.1, combined: 0.2 },
};

export const QUERY_HINTS: Record<RetrievalFocus, string> = {
  location: 'Địa điểm khu vực: ',
  service: 'Dịch vụ: ',
  target: 'Đối tượng: ',
  general: '',
  content: '',
};

export function selectFocus(components: QueryComponents): RetrievalFocus {
  let focus: RetrievalFocus = 'general';
  if (components.location) focus = 'location';
  else if (components.intent !== 'general') focus = 'service';
  else if (components.targetAudience) focus = 'target';

  if (focus !== 'general' && components.confidence < MIN_FOCUS_CONFIDENCE) return 'content';
  return focus;
}

export function dynamicWeights(components: QueryComponents): { focus: RetrievalFocus; weights: FacetWeights } {
  const focus = selectFocus(components);
  return { focus, weights: { ...FOCUS_WEIGHTS[focus] } };
}

/** Text handed to the embedding provider; empty for a blank query. */
export function queryEmbeddingText(query: string, focus: RetrievalFocus): string {
  const trimmed = query.trim();
  return trimmed ? `${QUERY_HINTS[focus]}${trimmed}` : '';
}
