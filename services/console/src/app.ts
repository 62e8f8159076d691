import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { logger, loadModelConfig, ModelRouter, type CompletionProvider } from '@switchboard/shared';
import {
  ConversationHistory,
  createRouterAgent,
  HumanChat,
  HumanProxyAgent,
  LlmAgent,
  Router,
  SqliteMessageStore,
  type GoalResult,
  type HumanChannel,
  type MessageStore,
} from '@switchboard/agents';
import { loadConfig } from './config.js';
import { ConsoleHumanChannel } from './console-channel.js';

const log = logger.child({ module: 'console' });

const PLANNER_PROMPT = `You are a planner. Break the goal into a short numbered list of concrete steps.
Do not carry out the steps yourself. Keep the plan under ten steps.`;

const WRITER_PROMPT = `You are a writer. Produce the text the goal asks for, following any plan in the conversation.
Answer with the finished text only.`;

export const CHAT_GREETING = 'What would you like to talk about? Type "done" to finish.';
export const GOAL_QUESTION = 'What goal should the agents pursue?';

export interface ConsoleAgents {
  human: HumanProxyAgent;
  planner: LlmAgent;
  writer: LlmAgent;
  router: Router;
}

export function createAgents(provider: CompletionProvider, store: MessageStore, channel: HumanChannel): ConsoleAgents {
  const human = new HumanProxyAgent({
    id: 'human',
    name: 'Human',
    description: 'The person at this console. Route here for clarification, approval or missing information.',
    store,
    channel,
  });
  const planner = new LlmAgent({
    id: 'planner',
    name: 'Planner',
    description: 'Breaks a goal into concrete steps.',
    systemPrompt: PLANNER_PROMPT,
    store,
    provider,
  });
  const writer = new LlmAgent({
    id: 'writer',
    name: 'Writer',
    description: 'Writes the text a goal calls for.',
    systemPrompt: WRITER_PROMPT,
    store,
    provider,
  });
  const router = new Router({ routerAgent: createRouterAgent({ provider, store }) });
  return { human, planner, writer, router };
}

/** Pursue `goal` with the Planner and Writer, then report the outcome to the human. */
export async function runGoal(
  agents: ConsoleAgents,
  goal: string,
  maxIterations: number,
  signal?: AbortSignal,
): Promise<GoalResult> {
  agents.router.initializeAgents(agents.human, [agents.planner, agents.writer]);
  const result = await agents.router.pursueGoal(goal, { maxIterations, signal });
  await agents.human.printMessage(`Goal ${result.outcome} after ${result.iterations} dispatches.`, 'text/plain');
  return result;
}

export function isDone(message: { content: string }): boolean {
  return message.content.trim().toLowerCase() === 'done';
}

/** Free-form chat between the human and the Writer. */
export async function runChat(agents: ConsoleAgents, signal?: AbortSignal): Promise<number> {
  const chat = new HumanChat(agents.human, agents.writer);
  return chat.startChat(CHAT_GREETING, isDone, signal);
}

export async function main(): Promise<void> {
  const config = loadConfig();
  const modelRouter = await ModelRouter.create(await loadModelConfig());

  mkdirSync(config.dataDir, { recursive: true });
  const store = new SqliteMessageStore(join(config.dataDir, 'switchboard.db'));
  const channel = new ConsoleHumanChannel();
  const agents = createAgents(modelRouter, store, channel);

  const controller = new AbortController();
  const onSigint = () => {
    log.info('interrupted');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    if (config.mode === 'chat') {
      const exchanges = await runChat(agents, controller.signal);
      log.info({ exchanges }, 'chat finished');
    } else {
      const goal =
        config.goal ?? (await channel.waitForResponse(GOAL_QUESTION, new ConversationHistory(), controller.signal));
      const result = await runGoal(agents, goal, config.maxIterations, controller.signal);
      log.info({ outcome: result.outcome, iterations: result.iterations, sessionId: result.sessionId }, 'goal finished');
    }
  } finally {
    process.off('SIGINT', onSigint);
    channel.close();
    store.close();
  }
}
