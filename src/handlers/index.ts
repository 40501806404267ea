import { GeneralChatHandler } from './general-chat.js';
import { KnowledgeHandler } from './knowledge.js';
import { ScheduleHandler } from './schedule.js';
import { SearchHandler } from './search.js';
import { SendMailHandler } from './send-mail.js';
import { TaskHandler } from './task.js';
import type { HandlerDeps, HandlerRegistry } from './types.js';

export type {
  CapabilityHandler,
  HandlerContext,
  HandlerDeps,
  HandlerRegistry,
  HandlerReply,
  RetrievalOutcome,
} from './types.js';

export function createHandlers(deps: HandlerDeps): HandlerRegistry {
  return {
    knowledge_query: new KnowledgeHandler(deps),
    schedule: new ScheduleHandler(deps),
    send_mail: new SendMailHandler(deps),
    search: new SearchHandler(deps),
    task: new TaskHandler(deps),
    general_chat: new GeneralChatHandler(deps),
  };
}
