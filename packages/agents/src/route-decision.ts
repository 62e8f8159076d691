import { z } from 'zod';
import { logger, ResolutionError, type JsonSchemaResponseFormat } from '@switchboard/shared';

const log = logger.child({ module: 'route-decision' });

export const MAX_RATIONALE_LENGTH = 240;

/** Values of `next` that end a goal pursuit without completing it */
export const STOP_SENTINELS: readonly string[] = ['stop', 'exit'];

export interface RouteDecision {
  /** Name of the agent that acts next, or a stop sentinel */
  next: string;
  rationale: string;
  /** 0..1 */
  confidence: number;
  goalCompleted: boolean;
}

export const ROUTE_DECISION_FORMAT: JsonSchemaResponseFormat = {
  type: 'json_schema',
  name: 'route_decision',
  description: 'Which agent should act next and whether the goal is complete.',
  schema: {
    type: 'object',
    properties: {
      next: {
        type: 'string',
        description: `Exact name of the agent to act next, or one of: ${STOP_SENTINELS.join(', ')}.`,
      },
      rationale: {
        type: 'string',
        description: `Why this agent was chosen, at most ${MAX_RATIONALE_LENGTH} characters.`,
      },
      confidence: {
        type: 'number',
        description: 'Confidence in the decision between 0 and 1.',
      },
      goalCompleted: {
        type: 'boolean',
        description: 'True once the goal has been achieved.',
      },
    },
    required: ['next', 'rationale', 'confidence', 'goalCompleted'],
    additionalProperties: false,
  },
};

export function isStopSentinel(next: string): boolean {
  const normalized = next.trim().toLowerCase();
  return STOP_SENTINELS.includes(normalized);
}

const FENCED = /^```[\w-]*\s*\n?([\s\S]*?)\n?\s*```$/;

function stripFences(content: string): string {
  const trimmed = content.trim();
  const match = FENCED.exec(trimmed);
  return match ? (match[1] ?? '').trim() : trimmed;
}

function typeError(message: string) {
  return { required_error: message, invalid_type_error: message };
}

const CONFIDENCE_RANGE = '"confidence" must be between 0 and 1';

const RouteDecisionSchema = z.object(
  {
    next: z
      .string(typeError('"next" must be a non-empty string'))
      .trim()
      .min(1, '"next" must be a non-empty string'),
    rationale: z.string(typeError('"rationale" must be a string')),
    confidence: z
      .number(typeError('"confidence" must be a number'))
      .finite('"confidence" must be a number')
      .min(0, CONFIDENCE_RANGE)
      .max(1, CONFIDENCE_RANGE),
    goalCompleted: z.boolean(typeError('"goalCompleted" must be a boolean')),
  },
  typeError('expected a JSON object'),
);

/**
 * Parse the router model's reply. Markdown code fences are tolerated; an
 * over-long rationale is truncated. Anything else malformed is a ResolutionError.
 */
export function parseRouteDecision(content: string): RouteDecision {
  const body = stripFences(content);
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new ResolutionError('route decision is not valid JSON', { operation: 'parseRouteDecision' }, { cause: err });
  }

  const result = RouteDecisionSchema.safeParse(parsed);
  if (!result.success) {
    const reason = result.error.issues[0]?.message ?? 'unknown shape';
    throw new ResolutionError(`invalid route decision: ${reason}`, { operation: 'parseRouteDecision' });
  }

  const decision = result.data;
  if (decision.rationale.length > MAX_RATIONALE_LENGTH) {
    log.warn({ length: decision.rationale.length }, 'route decision rationale truncated');
    decision.rationale = decision.rationale.slice(0, MAX_RATIONALE_LENGTH);
  }
  return decision;
}
