/**
 * Configuration management for the follow-up watcher
 */

import { config as dotenvConfig } from 'dotenv';

// Load .env file in development
dotenvConfig();

function getEnvVar(key: string, defaultValue?: string): string {
  const value = getOptionalEnvVar(key);
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getOptionalEnvVar(key: string): string | undefined {
  const value = process.env[key];
  return value === '' ? undefined : value;
}

function getEnvNumber(key: string, defaultValue: number): number {
  const value = getOptionalEnvVar(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for environment variable: ${key}`);
  }
  return parsed;
}

function getEnvFloat(key: string, defaultValue: number): number {
  const value = getOptionalEnvVar(key);
  if (value === undefined) {
    return defaultValue;
  }
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Invalid number for environment variable: ${key}`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = getOptionalEnvVar(key);
  if (value === undefined) {
    return defaultValue;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  throw new Error(`Invalid boolean for environment variable: ${key}`);
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type AIProvider = 'claude' | 'gemini';

export const DEFAULT_FOLLOW_UP_PROMPT = `You are a member of a group chat and you just sent a message.
Below are the messages other people sent after yours.
Decide whether any of them is addressed to you, asks you something, or otherwise clearly expects you to speak again.
Answer with a single word: "yes" if you should reply, "no" if you should stay quiet.`;

export interface FollowUpConfig {
  enabled: boolean;
  /** Window length before the collected messages are evaluated */
  timeoutSeconds: number;
  /** Collected messages that close the window early */
  maxMessages: number;
  /** Re-arms allowed after a negative verdict; null means no limit */
  maxRestarts: number | null;
  pollIntervalMs: number;
  /** Willingness written for the conversation on a positive verdict */
  replyWillingness: number;
  prompt: string;
  model?: string;
}

export interface Config {
  // AI Provider
  aiProvider: AIProvider;
  anthropicApiKey?: string;
  geminiApiKey?: string;
  aiModel?: string;

  followUp: FollowUpConfig;

  // Logging
  logLevel: LogLevel;
}

export function parseLogLevel(value: string): LogLevel {
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      console.warn(`Invalid log level "${value}", defaulting to "info"`);
      return 'info';
  }
}

function parseAIProvider(value: string): AIProvider {
  switch (value) {
    case 'claude':
    case 'gemini':
      return value;
    default:
      console.warn(`Invalid AI provider "${value}", defaulting to "gemini"`);
      return 'gemini';
  }
}

function parseMaxRestarts(key: string): number | null {
  if (getOptionalEnvVar(key) === undefined) {
    return null;
  }
  const parsed = getEnvNumber(key, 0);
  if (parsed < 0) {
    throw new Error(`${key} must not be negative`);
  }
  return parsed;
}

function loadFollowUpConfig(aiModel: string | undefined): FollowUpConfig {
  const timeoutSeconds = getEnvFloat('FOLLOW_UP_TIMEOUT_SECONDS', 60);
  const maxMessages = getEnvNumber('FOLLOW_UP_MAX_MESSAGES', 5);
  const pollIntervalMs = getEnvNumber('FOLLOW_UP_POLL_INTERVAL_MS', 1000);

  if (timeoutSeconds <= 0) {
    throw new Error('FOLLOW_UP_TIMEOUT_SECONDS must be greater than 0');
  }
  if (maxMessages < 1) {
    throw new Error('FOLLOW_UP_MAX_MESSAGES must be at least 1');
  }
  if (pollIntervalMs < 1) {
    throw new Error('FOLLOW_UP_POLL_INTERVAL_MS must be at least 1');
  }

  return {
    enabled: getEnvBoolean('FOLLOW_UP_ENABLED', true),
    timeoutSeconds,
    maxMessages,
    maxRestarts: parseMaxRestarts('FOLLOW_UP_MAX_RESTARTS'),
    pollIntervalMs,
    replyWillingness: getEnvFloat('FOLLOW_UP_REPLY_WILLINGNESS', 2.0),
    prompt: getOptionalEnvVar('FOLLOW_UP_PROMPT') ?? DEFAULT_FOLLOW_UP_PROMPT,
    model: getOptionalEnvVar('FOLLOW_UP_MODEL') ?? aiModel,
  };
}

export function loadConfig(): Config {
  const aiProvider = parseAIProvider(getEnvVar('AI_PROVIDER', 'gemini'));

  // Validate that the required API key is present for the selected provider
  const anthropicApiKey = getOptionalEnvVar('ANTHROPIC_API_KEY');
  const geminiApiKey = getOptionalEnvVar('GEMINI_API_KEY');

  if (aiProvider === 'claude' && !anthropicApiKey) {
    throw new Error('ANTHROPIC_API_KEY is required when AI_PROVIDER is "claude"');
  }
  if (aiProvider === 'gemini' && !geminiApiKey) {
    throw new Error('GEMINI_API_KEY is required when AI_PROVIDER is "gemini"');
  }

  const aiModel = getOptionalEnvVar('AI_MODEL');

  return {
    aiProvider,
    anthropicApiKey,
    geminiApiKey,
    aiModel,
    followUp: loadFollowUpConfig(aiModel),
    logLevel: parseLogLevel(getEnvVar('LOG_LEVEL', 'info')),
  };
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  configInstance ??= loadConfig();
  return configInstance;
}
