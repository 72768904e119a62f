import { describe, it, expect, vi, afterEach } from 'vitest';
import { PromptSynthesizer, fallbackPrompt, FALLBACK_RATIONALE } from '../../src/lib/optimize/synthesizer';
import { MockModelAdapter, MockConfig } from '../../src/lib/providers/mock/mock';
import { mock } from '../../src/lib/models';
import { Neighbor } from '../../src/lib/optimize/types';

const QUERY = 'how do I recover my account';

const neighbors: Neighbor[] = [
  { query: 'reset password', response: 'click forgot password', preferenceLabel: 1, embedding: [1, 0], similarity: 0.9 },
];

function synthesizerWith(config: MockConfig): { synthesizer: PromptSynthesizer; adapter: MockModelAdapter } {
  const adapter = new MockModelAdapter(mock('generator', config));
  const synthesizer = new PromptSynthesizer(adapter, {
    settings: { temperature: 0.7, maxTokens: 1000 },
    retry: { sleep: async () => {} },
  });
  return { synthesizer, adapter };
}

describe('PromptSynthesizer', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('builds a prompt from the neighbours and the target query', () => {
    const { synthesizer } = synthesizerWith({});
    const prompt = synthesizer.buildPrompt(QUERY, neighbors);

    expect(prompt.startsWith('You are an expert prompt optimizer.')).toBe(true);
    expect(prompt).toContain('User Query: reset password\nResponse: click forgot password\nUser Feedback: 👍 (Liked)\nSimilarity Score: 0.900\n\n');
    expect(prompt).toContain(`Target User Query: ${QUERY}\n\n`);
    expect(prompt.endsWith("Format your response as JSON with 'optimized_prompt' and 'reasoning' fields.")).toBe(true);
  });

  it('parses structured output', async () => {
    const { synthesizer, adapter } = synthesizerWith({
      responses: { chat: '{"optimized_prompt": "  Walk the user through account recovery step by step.  ", "reasoning": "Liked answers were procedural"}' },
    });

    expect(await synthesizer.synthesize(QUERY, neighbors)).toEqual({
      optimizedPrompt: 'Walk the user through account recovery step by step.',
      rationale: 'Liked answers were procedural',
      source: 'structured',
    });
    expect(adapter.calls[0].options).toEqual({ temperature: 0.7, maxTokens: 1000 });
  });

  it('accepts JSON inside a code fence and a missing rationale', async () => {
    const { synthesizer } = synthesizerWith({
      responses: { chat: '```json\n{"optimized_prompt": "Be specific."}\n```' },
    });

    expect(await synthesizer.synthesize(QUERY, neighbors)).toEqual({
      optimizedPrompt: 'Be specific.',
      rationale: '',
      source: 'structured',
    });
  });

  it('keeps the optimized prompt when the reasoning is not a string', async () => {
    const { synthesizer } = synthesizerWith({
      responses: { chat: '{"optimized_prompt": "Be concise.", "reasoning": ["a", "b"]}' },
    });

    expect(await synthesizer.synthesize(QUERY, neighbors)).toEqual({
      optimizedPrompt: 'Be concise.',
      rationale: '["a","b"]',
      source: 'structured',
    });
  });

  it('uses raw text as the prompt when the output is not JSON', async () => {
    const { synthesizer } = synthesizerWith({
      responses: { chat: '  Explain the recovery link and the support contact.  ' },
    });

    expect(await synthesizer.synthesize(QUERY, neighbors)).toEqual({
      optimizedPrompt: 'Explain the recovery link and the support contact.',
      rationale: '',
      source: 'raw_text',
    });
  });

  it('uses raw text when the JSON lacks an optimized prompt', async () => {
    const { synthesizer } = synthesizerWith({ responses: { chat: '{"prompt": "Be brief."}' } });

    expect(await synthesizer.synthesize(QUERY, neighbors)).toMatchObject({
      optimizedPrompt: '{"prompt": "Be brief."}',
      source: 'raw_text',
    });
  });

  it('falls back when the model returns nothing', async () => {
    const { synthesizer } = synthesizerWith({ responses: { chat: '   ' } });

    expect(await synthesizer.synthesize(QUERY, neighbors)).toEqual({
      optimizedPrompt: `Please provide a helpful and accurate response to: ${QUERY}`,
      rationale: FALLBACK_RATIONALE,
      source: 'fallback',
    });
  });

  it('falls back when generation fails entirely', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    const { synthesizer } = synthesizerWith({ shouldFail: true, failWith: 'unauthorized' });

    const result = await synthesizer.synthesize(QUERY, neighbors);

    expect(result.source).toBe('fallback');
    expect(result.optimizedPrompt).toBe(fallbackPrompt(QUERY));
    expect(result.optimizedPrompt.length).toBeGreaterThan(0);
    expect(result.rationale).toBe('Fallback prompt due to generation error');
  });

  it('retries transient failures before falling back', async () => {
    const { synthesizer, adapter } = synthesizerWith({
      failTimes: 1,
      failWith: 'timeout',
      responses: { chat: '{"optimized_prompt": "Be specific."}' },
    });

    expect((await synthesizer.synthesize(QUERY, neighbors)).source).toBe('structured');
    expect(adapter.calls).toHaveLength(2);
  });
});
