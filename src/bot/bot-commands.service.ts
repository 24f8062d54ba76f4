import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { statusOf } from '../api-keys/api-key-access.service';
import {
  InvalidKeyRequestError,
  StoreUnavailableError,
  TokenGenerationExhaustedError,
} from '../api-keys/api-key.errors';
import { ApiKeysService } from '../api-keys/api-keys.service';
import { ApiKeyRecord } from '../api-keys/types';
import { UpstreamClientService } from '../upstream/upstream-client.service';
import { UpstreamError, UpstreamTimeoutError } from '../upstream/upstream.errors';
import { fingerprintToken } from '../utils/hash';
import { AdminGate } from './admin-gate.service';
import { AdminAccessDeniedError } from './bot.errors';
import {
  AdminCommand,
  chunkEntries,
  deletedMessage,
  helpMessage,
  keyCreatedMessage,
  listEntry,
  reworkMessage,
  startMessage,
  testMessage,
  usageLine,
  usageMessage,
} from './bot-messages';
import { TelegramApiService } from './telegram-api.service';
import { TelegramMessage, TelegramUpdate } from './telegram.types';

type ParsedCommand = {
  command: string;
  args: string;
};

type AdminOutcome = {
  replies: string[];
  result: 'ok' | 'error';
  details?: Record<string, unknown>;
};

const ADMIN_COMMANDS: ReadonlySet<string> = new Set<string>([
  'genkey',
  'list',
  'usage',
  'rework',
  'delkey',
  'test',
] satisfies AdminCommand[]);

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/;

export function parseCommand(text: string): ParsedCommand | null {
  const match = COMMAND_PATTERN.exec(text.trim());
  if (!match?.[1]) {
    return null;
  }
  return { command: match[1].toLowerCase(), args: (match[2] ?? '').trim() };
}

function isAdminCommand(command: string): command is AdminCommand {
  return ADMIN_COMMANDS.has(command);
}

@Injectable()
export class BotCommandsService {
  private readonly logger = new Logger(BotCommandsService.name);
  private readonly publicBaseUrl: string;

  constructor(
    private readonly apiKeysService: ApiKeysService,
    private readonly upstreamClient: UpstreamClientService,
    private readonly telegramApi: TelegramApiService,
    private readonly adminGate: AdminGate,
    private readonly configService: ConfigService,
  ) {
    this.publicBaseUrl =
      this.configService.get<string>('PUBLIC_BASE_URL') ?? 'http://localhost:3000';
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message;
    const text = message?.text?.trim();
    if (!message || !text) {
      return;
    }

    if (!text.startsWith('/')) {
      await this.chat(message.chat.id, text);
      return;
    }

    const parsed = parseCommand(text);
    if (!parsed) {
      return;
    }

    const { command, args } = parsed;
    if (command === 'start') {
      await this.telegramApi.sendMessage(message.chat.id, startMessage(), 'Markdown');
      return;
    }
    if (command === 'help') {
      await this.telegramApi.sendMessage(message.chat.id, helpMessage(), 'Markdown');
      return;
    }
    if (isAdminCommand(command)) {
      await this.runAdminCommand(command, args, message);
      return;
    }

    this.logger.debug(`Ignoring unknown command /${command}`);
  }

  private async chat(chatId: number, text: string): Promise<void> {
    let reply: string;
    try {
      ({ reply } = await this.upstreamClient.complete(text));
    } catch (error) {
      if (!(error instanceof UpstreamError)) {
        throw error;
      }
      await this.telegramApi.sendMessage(chatId, 'Upstream request failed');
      return;
    }

    for (const chunk of chunkEntries([reply])) {
      await this.telegramApi.sendMessage(chatId, chunk);
    }
  }

  private async runAdminCommand(
    command: AdminCommand,
    args: string,
    message: TelegramMessage,
  ): Promise<void> {
    let adminIdentity: string;
    try {
      adminIdentity = this.adminGate.requireAdmin(message.from?.id);
    } catch (error) {
      if (error instanceof AdminAccessDeniedError) {
        return;
      }
      throw error;
    }

    const chatId = message.chat.id;
    let outcome: AdminOutcome;
    try {
      outcome = await this.executeAdminCommand(command, args);
    } catch (error) {
      const reply = this.describeFailure(error);
      this.audit(command, 'error', adminIdentity, chatId, { reason: errorReason(error) });
      if (reply === null) {
        throw error;
      }
      await this.telegramApi.sendMessage(chatId, reply, 'Markdown');
      return;
    }

    this.audit(command, outcome.result, adminIdentity, chatId, outcome.details);
    for (const reply of outcome.replies) {
      await this.telegramApi.sendMessage(chatId, reply, 'Markdown');
    }
  }

  private async executeAdminCommand(command: AdminCommand, args: string): Promise<AdminOutcome> {
    switch (command) {
      case 'genkey': {
        const [name, days] = args.split(/\s+/).filter((part) => part.length > 0);
        if (!name || !days) {
          return missingArguments(command);
        }
        const record = await this.apiKeysService.createKey(name, Number(days));
        return {
          replies: [keyCreatedMessage(record, this.publicBaseUrl)],
          result: 'ok',
          details: describeRecord(record),
        };
      }
      case 'list': {
        const records = await this.apiKeysService.listAll();
        const now = Date.now();
        const replies =
          records.length === 0
            ? ['*No keys found*']
            : chunkEntries(records.map((record) => listEntry(record, statusOf(record, now))));
        return { replies, result: 'ok', details: { count: records.length } };
      }
      case 'usage': {
        if (!args) {
          return missingArguments(command);
        }
        const record = await this.apiKeysService.getUsage(args);
        if (!record) {
          return { replies: ['*Key not found*'], result: 'ok', details: { found: false } };
        }
        return { replies: [usageMessage(record)], result: 'ok', details: describeRecord(record) };
      }
      case 'rework': {
        if (!args) {
          return missingArguments(command);
        }
        const record = await this.apiKeysService.rotate(args);
        return { replies: [reworkMessage(record)], result: 'ok', details: describeRecord(record) };
      }
      case 'delkey': {
        if (!args) {
          return missingArguments(command);
        }
        const count = await this.apiKeysService.deleteByKeyOrName(args);
        return { replies: [deletedMessage(count)], result: 'ok', details: { count } };
      }
      case 'test':
        return args ? this.testUpstream(args) : missingArguments(command);
    }
  }

  /** `main` checks the upstream only; a key or name also reports that record's state. */
  private async testUpstream(target: string): Promise<AdminOutcome> {
    let record: ApiKeyRecord | null = null;
    if (target.toLowerCase() !== 'main') {
      record = await this.apiKeysService.getUsage(target);
      if (!record) {
        return { replies: ['*Key not found*'], result: 'ok', details: { found: false } };
      }
    }

    const { latency } = await this.upstreamClient.complete('OK');
    const state = record ? { record, status: statusOf(record) } : undefined;
    return {
      replies: [testMessage(latency, state)],
      result: 'ok',
      details: { latency, ...(record ? describeRecord(record) : {}) },
    };
  }

  /** Reply text for failures the admin can act on; null for everything else. */
  private describeFailure(error: unknown): string | null {
    if (error instanceof InvalidKeyRequestError) {
      return `*Invalid request:* ${error.message}`;
    }
    if (error instanceof StoreUnavailableError) {
      return '*Key store unavailable*';
    }
    if (error instanceof TokenGenerationExhaustedError) {
      return '*Could not generate a unique key, try again*';
    }
    if (error instanceof UpstreamTimeoutError) {
      return '*Upstream request timed out*';
    }
    if (error instanceof UpstreamError) {
      return '*Upstream request failed*';
    }
    return null;
  }

  private audit(
    action: AdminCommand,
    result: 'ok' | 'error',
    adminIdentity: string,
    chatId: number,
    details?: Record<string, unknown>,
  ): void {
    const payload = {
      event: 'admin_key_audit',
      action,
      result,
      adminIdentity,
      chatId,
      ...details,
    };

    if (result === 'error') {
      this.logger.warn(JSON.stringify(payload));
      return;
    }

    this.logger.log(JSON.stringify(payload));
  }
}

function missingArguments(command: Exclude<AdminCommand, 'list'>): AdminOutcome {
  return {
    replies: [usageLine(command)],
    result: 'error',
    details: { reason: 'MissingArguments' },
  };
}

function describeRecord(record: ApiKeyRecord): Record<string, unknown> {
  return { name: record.name, key: fingerprintToken(record.key) };
}

function errorReason(error: unknown): string {
  if (error instanceof Error) {
    return error.name;
  }
  return 'UnknownError';
}
