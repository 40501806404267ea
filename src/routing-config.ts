import fs from 'fs';
import yaml from 'js-yaml';
import { z } from 'zod';

import { ROUTING_CONFIG_PATH } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { Intent } from './types.js';

export interface RoutingConfig {
  lexicalEnabled: boolean;
  lexicalConfidence: number;
  confidenceThreshold: number;
  historyTurns: number;
  keywords: Record<Intent, string[]>;
}

const keywordList = z.array(z.string().trim().min(1)).default([]);

const RoutingFileSchema = z.object({
  lexical: z
    .object({
      enabled: z.boolean().default(true),
      confidence: z.number().min(0).max(1).default(0.9),
    })
    .default({}),
  confidence_threshold: z.number().min(0).max(1).default(0.6),
  history_turns: z.number().int().min(0).default(4),
  intents: z
    .object({
      knowledge_query: keywordList,
      schedule: keywordList,
      send_mail: keywordList,
      search: keywordList,
      task: keywordList,
      general_chat: keywordList,
    })
    .strict()
    .default({}),
});

export const DEFAULT_ROUTING_CONFIG: RoutingConfig = {
  lexicalEnabled: true,
  lexicalConfidence: 0.9,
  confidenceThreshold: 0.6,
  historyTurns: 4,
  keywords: {
    knowledge_query: ['refund', 'refunds', 'faq', 'warranty'],
    schedule: ['schedule', 'meeting', 'appointment'],
    send_mail: ['email', 'e-mail', 'send mail'],
    search: ['search the web', 'look up', 'latest news'],
    task: ['todo', 'task', 'tasks', 'remind me'],
    general_chat: [],
  },
};

/** Parse routing YAML text. Throws ConfigurationError when invalid. */
export function parseRoutingConfig(text: string, source = 'routing config'): RoutingConfig {
  let raw: unknown;
  try {
    raw = yaml.load(text) ?? {};
  } catch (err) {
    throw new ConfigurationError(`${source}: invalid YAML: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = RoutingFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigurationError(`${source}: ${issues}`);
  }

  const file = parsed.data;
  return {
    lexicalEnabled: file.lexical.enabled,
    lexicalConfidence: file.lexical.confidence,
    confidenceThreshold: file.confidence_threshold,
    historyTurns: file.history_turns,
    keywords: file.intents,
  };
}

export function loadRoutingConfig(configPath: string = ROUTING_CONFIG_PATH): RoutingConfig {
  if (!fs.existsSync(configPath)) {
    logger.warn({ configPath }, 'Routing config not found, using defaults');
    return DEFAULT_ROUTING_CONFIG;
  }
  const config = parseRoutingConfig(fs.readFileSync(configPath, 'utf8'), configPath);
  logger.info(
    {
      configPath,
      keywords: Object.values(config.keywords).reduce((n, list) => n + list.length, 0),
    },
    'Routing configuration loaded',
  );
  return config;
}
