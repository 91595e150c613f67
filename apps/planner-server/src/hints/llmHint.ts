import {
  HintUnavailableError,
  unassignedRequiredSlots,
  type Goal,
  type HintSource,
  type PlanState,
} from '@waypoint/planning-core';
import type { ChatModelAdapter } from '../adapters/llm';

export const REMAINING_STEPS_PROMPT = [
  'You estimate how many more tool calls a travel booking agent needs to finish a request.',
  'The agent fills slots in order: origin, destination, transport, then confirms the booking.',
  'Respond with ONE non-negative number. No words, no explanations.',
  '',
  'Example:',
  'Slots: {"origin":"New York","destination":null,"transport":null,"booking":null}',
  'Open slots: destination, transport, booking',
  '-> 3',
].join('\n');

function describeGoal(goal: Goal): string {
  return goal.constraints
    .map((constraint) => `${constraint.severity} ${constraint.id}: ${constraint.description ?? constraint.slot}`)
    .join('\n');
}

export function parseEstimate(reply: string): number | null {
  const match = /-?\d+(?:\.\d+)?/.exec(reply);
  if (!match) {
    return null;
  }
  const value = Number(match[0]);
  return Number.isFinite(value) ? value : null;
}

/**
 * Hint source backed by a chat model: the model is asked for the number of
 * remaining tool calls. Any model error surfaces as {@link HintUnavailableError},
 * which degrades the run to structural estimates.
 */
export class LlmHintSource implements HintSource {
  readonly name = 'llm';

  constructor(private readonly model: ChatModelAdapter) {}

  async estimate(state: PlanState, goal: Goal, signal: AbortSignal): Promise<number> {
    const prompt = [
      `Slots: ${JSON.stringify(state.slots)}`,
      `Open slots: ${unassignedRequiredSlots(state, goal).join(', ') || '<none>'}`,
      `Constraints:\n${describeGoal(goal) || '<none>'}`,
    ].join('\n');

    let reply: string;
    try {
      reply = await this.model.generate(prompt, { systemPrompt: REMAINING_STEPS_PROMPT, signal });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HintUnavailableError(this.name, `chat model unavailable: ${message}`, error);
    }

    const value = parseEstimate(reply);
    if (value === null) {
      throw new HintUnavailableError(this.name, `chat model returned no number: ${JSON.stringify(reply)}`);
    }
    return value;
  }
}
