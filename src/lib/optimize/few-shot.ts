import { PreferenceLabel, LabeledExample, Neighbor } from './types';

/** How a preference label is shown to models. */
export function feedbackLabel(label: PreferenceLabel): string {
  return label === 1 ? '👍 (Liked)' : '👎 (Disliked)';
}

export interface FewShotBlockOptions {
  /** Append each neighbour's similarity score (3 decimals) */
  includeSimilarity?: boolean;
}

/* Helper: convert neighbours to readable prompt text */
export function buildFewShotBlock(
  examples: ReadonlyArray<LabeledExample | Neighbor>,
  options: FewShotBlockOptions = {}
): string {
  return examples
    .map(example => {
      const lines = [
        `User Query: ${example.query}`,
        `Response: ${example.response}`,
        `User Feedback: ${feedbackLabel(example.preferenceLabel)}`,
      ];
      if (options.includeSimilarity && 'similarity' in example) {
        lines.push(`Similarity Score: ${example.similarity.toFixed(3)}`);
      }
      return lines.join('\n') + '\n\n';
    })
    .join('');
}
