// Utilities: Configuration management
// Pure functions, no external dependencies

import type { JokerRule } from '@/domain/scoring/types.js';
import { DEFAULT_POINTS, DEFAULT_RULE_OPTIONS, type RuleOptionsInput } from '@/domain/scoring/catalog.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  corsOrigins: string[];
  logLevel: LogLevel;
}

export interface RulesConfig {
  jokerRule: JokerRule;
  fullHouseAcceptsYahtzee: boolean;
  yahtzeeBonusPoints: number;
}

export interface AppConfig {
  server: ServerConfig;
  rules: RulesConfig;
}

const JOKER_RULES: readonly JokerRule[] = ['standard', 'free_choice', 'none'];
const NODE_ENVS: readonly ServerConfig['nodeEnv'][] = ['development', 'production', 'test'];

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

// Configuration builders
export function buildServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const nodeEnv = NODE_ENVS.find((candidate) => candidate === env.NODE_ENV) ?? 'development';
  const rawLogLevel = env.LOG_LEVEL || 'info';
  const logLevel: LogLevel = isLogLevel(rawLogLevel) ? rawLogLevel : 'info';

  return {
    port: Number(env.PORT || '3000'),
    host: env.HOST || 'localhost',
    nodeEnv,
    corsOrigins: parseList(env.CORS_ORIGINS, ['http://localhost:3000', 'http://127.0.0.1:3000']),
    logLevel,
  };
}

export function buildRulesConfig(env: NodeJS.ProcessEnv = process.env): RulesConfig {
  const jokerRule = JOKER_RULES.find((rule) => rule === env.JOKER_RULE) ?? DEFAULT_RULE_OPTIONS.jokerRule;

  return {
    jokerRule,
    fullHouseAcceptsYahtzee: parseBoolean(env.FULL_HOUSE_ACCEPTS_YAHTZEE, DEFAULT_RULE_OPTIONS.fullHouseAcceptsYahtzee),
    yahtzeeBonusPoints: env.YAHTZEE_BONUS_POINTS
      ? Number(env.YAHTZEE_BONUS_POINTS)
      : DEFAULT_POINTS.yahtzeeBonus,
  };
}

export function buildAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    server: buildServerConfig(env),
    rules: buildRulesConfig(env),
  };
}

export function toRuleOptions(rules: RulesConfig): RuleOptionsInput {
  return {
    jokerRule: rules.jokerRule,
    fullHouseAcceptsYahtzee: rules.fullHouseAcceptsYahtzee,
    points: { yahtzeeBonus: rules.yahtzeeBonusPoints },
  };
}

// Validation
export function validateConfig(config: AppConfig, env: NodeJS.ProcessEnv = process.env): string[] {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('Invalid port number');
  }

  if (env.JOKER_RULE && !JOKER_RULES.some((rule) => rule === env.JOKER_RULE)) {
    errors.push(`JOKER_RULE must be one of: ${JOKER_RULES.join(', ')}`);
  }

  if (env.LOG_LEVEL && !isLogLevel(env.LOG_LEVEL)) {
    errors.push('LOG_LEVEL must be one of: debug, info, warn, error');
  }

  if (!Number.isInteger(config.rules.yahtzeeBonusPoints) || config.rules.yahtzeeBonusPoints < 0) {
    errors.push('YAHTZEE_BONUS_POINTS must be a non-negative integer');
  }

  return errors;
}
