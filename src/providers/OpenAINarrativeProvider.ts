/**
 * OpenAI narrative provider.
 * Asks a chat model for a two or three sentence summary of the ranked hypotheses.
 * Never invents new hypotheses; the prompt only carries what the engine found.
 */

import OpenAI from 'openai';
import type { INarrativeProvider, NarrativeInput } from './INarrativeProvider.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const MAX_HYPOTHESES_IN_PROMPT = 5;

const SYSTEM_PROMPT =
  'You are a port operations support engineer. Summarize the ranked root-cause hypotheses ' +
  'for the incident in at most three sentences. Do not introduce causes that are not listed.';

export interface OpenAINarrativeProviderOptions {
  apiKey: string;
  model?: string;
}

export class OpenAINarrativeProvider implements INarrativeProvider {
  private readonly client: OpenAI;
  private readonly model: string;

  constructor(opts: OpenAINarrativeProviderOptions) {
    this.client = new OpenAI({ apiKey: opts.apiKey });
    this.model = opts.model ?? DEFAULT_MODEL;
  }

  async summarize(input: NarrativeInput): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0.2,
      max_tokens: 200,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: buildPrompt(input) },
      ],
    });

    const content = response.choices[0]?.message.content?.trim();
    if (!content) throw new Error('OpenAI returned an empty summary');
    return content;
  }
}

export function buildPrompt(input: NarrativeInput): string {
  const lines = input.hypotheses
    .slice(0, MAX_HYPOTHESES_IN_PROMPT)
    .map((h, i) => `${i + 1}. (${h.confidence.toFixed(2)}) ${h.description}`);

  return [
    `Incident (${input.incidentType}): ${input.incidentText}`,
    'Hypotheses:',
    ...lines,
  ].join('\n');
}
