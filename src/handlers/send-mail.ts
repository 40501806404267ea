import { z } from 'zod';

import { callCapability, extractFields, historyBlock } from './shared.js';
import type { CapabilityHandler, HandlerContext, HandlerDeps, HandlerReply } from './types.js';

const MailFields = z.object({
  to: z.string().nullable().default(null),
  cc: z.array(z.string()).default([]),
  subject: z.string().nullable().default(null),
  body: z.string().nullable().default(null),
  missing: z.array(z.string()).default([]),
});

const email = z.string().email();

export const ASK_FOR_RECIPIENT = 'Who should I send it to? Please give me their email address.';
export const ASK_FOR_BODY = 'What should the email say?';

export class SendMailHandler implements CapabilityHandler {
  readonly intent = 'send_mail' as const;

  constructor(private readonly deps: HandlerDeps) {}

  async handle(message: string, context: HandlerContext): Promise<HandlerReply> {
    const prompt = `Conversation so far:
${historyBlock(context.state, 4)}

Request:
<message>${message}</message>

Extract the email the user wants to send as JSON:
{"to": email address|null, "cc": [email addresses], "subject": string|null, "body": string|null, "missing": [names of required fields the user did not give]}
Write the body as the user would send it. Use null for anything not stated; never invent an address.`;

    const fields = await extractFields(this.deps.completion, prompt, MailFields, context);
    if (!fields) return { text: ASK_FOR_RECIPIENT, clarification: true };

    const to = fields.to?.trim() ?? '';
    if (!email.safeParse(to).success) {
      return { text: ASK_FOR_RECIPIENT, clarification: true };
    }
    const body = fields.body?.trim() ?? '';
    if (!body) return { text: ASK_FOR_BODY, clarification: true };

    const subject = fields.subject?.trim() || '(no subject)';
    const cc = fields.cc.filter((c) => email.safeParse(c).success);

    await callCapability(
      'send the email',
      () =>
        this.deps.capabilities.email.sendMessage({
          to,
          subject,
          body,
          cc: cc.length > 0 ? cc : undefined,
        }),
      context,
    );

    return { text: `Email sent to ${to} with subject "${subject}".` };
  }
}
