import { logger, PreconditionError } from '@switchboard/shared';
import type { Agent, HumanProxy } from './agent.js';
import { newId, type AgentMessage } from './message.js';

const log = logger.child({ module: 'human-chat' });

/** Returns true when the human's latest message should end the chat. */
export type EndCondition = (message: AgentMessage) => boolean;

/** Direct back-and-forth between one human proxy and one agent, no routing. */
export class HumanChat {
  readonly sessionId: string;

  constructor(
    private readonly human: HumanProxy,
    private readonly agent: Agent,
  ) {
    this.sessionId = newId();
    human.setSession(this.sessionId);
    agent.setSession(this.sessionId);
  }

  /** Run the chat until `endCondition` accepts a human message. Resolves to the number of agent turns. */
  async startChat(initialMessage: string, endCondition: EndCondition, signal?: AbortSignal): Promise<number> {
    if (!initialMessage.trim()) {
      throw new PreconditionError('initial message must not be empty', { operation: 'startChat', sessionId: this.sessionId });
    }

    let exchanges = 0;
    let humanMessage = await this.human.send(initialMessage, { signal });
    while (!endCondition(humanMessage)) {
      signal?.throwIfAborted();
      const agentMessage = await this.agent.send(humanMessage.content, { signal });
      exchanges++;
      await this.human.printMessage(agentMessage.content, agentMessage.mimeType);
      this.human.history.merge(this.agent.history);
      humanMessage = await this.human.reply({ signal });
    }

    log.info({ sessionId: this.sessionId, exchanges }, 'chat ended');
    return exchanges;
  }
}
