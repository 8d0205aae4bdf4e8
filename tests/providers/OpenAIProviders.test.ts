import { describe, it, expect, vi, beforeEach } from 'vitest';

const { embeddingsCreate, chatCreate, OpenAIMock } = vi.hoisted(() => {
  const embeddingsCreate = vi.fn();
  const chatCreate = vi.fn();
  const OpenAIMock = vi.fn().mockImplementation(() => ({
    embeddings: { create: embeddingsCreate },
    chat: { completions: { create: chatCreate } },
  }));
  return { embeddingsCreate, chatCreate, OpenAIMock };
});

vi.mock('openai', () => ({ default: OpenAIMock }));

import { OpenAIEmbeddingProvider } from '../../src/providers/OpenAIEmbeddingProvider.js';
import { buildPrompt, OpenAINarrativeProvider } from '../../src/providers/OpenAINarrativeProvider.js';
import type { Hypothesis } from '../../src/types/models.js';

function hypothesis(description: string, confidence: number): Hypothesis {
  return {
    description,
    confidence,
    rule: 'data_inconsistency',
    evidence: [],
    contributingFactors: [],
    source: null,
  };
}

describe('OpenAIEmbeddingProvider', () => {
  beforeEach(() => {
    embeddingsCreate.mockReset();
    OpenAIMock.mockClear();
  });

  it('should request the configured model and dimensions', async () => {
    embeddingsCreate.mockResolvedValue({ data: [{ index: 0, embedding: [0.1, 0.2] }] });
    const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-secret' });

    expect(await provider.generate('crane halt')).toEqual([0.1, 0.2]);
    expect(OpenAIMock).toHaveBeenCalledWith({ apiKey: 'test-secret' });
    expect(embeddingsCreate).toHaveBeenCalledWith({
      model: 'text-embedding-3-small',
      input: 'crane halt',
      dimensions: 1536,
    });
    expect(provider.dimensions).toBe(1536);
  });

  it('should fail when no embedding comes back', async () => {
    embeddingsCreate.mockResolvedValue({ data: [] });
    const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-secret' });

    await expect(provider.generate('x')).rejects.toThrow('OpenAI returned no embedding');
  });
});

describe('OpenAINarrativeProvider', () => {
  beforeEach(() => {
    chatCreate.mockReset();
  });

  it('should return the trimmed completion', async () => {
    chatCreate.mockResolvedValue({ choices: [{ message: { content: '  Likely a double submit.  ' } }] });
    const provider = new OpenAINarrativeProvider({ apiKey: 'test-secret', model: 'gpt-test' });

    const summary = await provider.summarize({
      incidentText: 'Duplicate container',
      incidentType: 'container_duplication',
      hypotheses: [hypothesis('Double submit', 0.95)],
    });

    expect(summary).toBe('Likely a double submit.');
    expect(chatCreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'gpt-test' }));
  });

  it('should reject an empty completion', async () => {
    chatCreate.mockResolvedValue({ choices: [{ message: { content: '' } }] });
    const provider = new OpenAINarrativeProvider({ apiKey: 'test-secret' });

    await expect(
      provider.summarize({ incidentText: 'x', incidentType: 'x', hypotheses: [] })
    ).rejects.toThrow('OpenAI returned an empty summary');
  });

  it('should list at most five hypotheses in the prompt', () => {
    const hypotheses = [0.9, 0.8, 0.7, 0.6, 0.5, 0.4].map((c, i) => hypothesis(`Cause ${i + 1}`, c));

    expect(
      buildPrompt({ incidentText: 'Gate slowdown', incidentType: 'gate_slowdown', hypotheses })
    ).toBe(
      [
        'Incident (gate_slowdown): Gate slowdown',
        'Hypotheses:',
        '1. (0.90) Cause 1',
        '2. (0.80) Cause 2',
        '3. (0.70) Cause 3',
        '4. (0.60) Cause 4',
        '5. (0.50) Cause 5',
      ].join('\n')
    );
  });
});
