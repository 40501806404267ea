import { ASSISTANT_NAME } from '../config.js';
import { completeOrFail, historyBlock } from './shared.js';
import type { CapabilityHandler, HandlerContext, HandlerDeps, HandlerReply } from './types.js';

const HISTORY_TURNS = 5;

export class GeneralChatHandler implements CapabilityHandler {
  readonly intent = 'general_chat' as const;

  constructor(private readonly deps: HandlerDeps) {}

  async handle(message: string, context: HandlerContext): Promise<HandlerReply> {
    const prompt = `Conversation so far:
${historyBlock(context.state, HISTORY_TURNS)}

User message:
<message>${message}</message>

Reply to the user.`;

    const text = await completeOrFail(this.deps.completion, prompt, context, {
      system: `You are ${ASSISTANT_NAME}, a friendly assistant chatting over a messaging app. Keep replies short and conversational, and answer in the user's language.`,
    });
    return { text };
  }
}
