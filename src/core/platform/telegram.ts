// src/core/platform/telegram.ts
import * as fs from 'fs/promises';
import * as path from 'path';
import bigInt from 'big-integer';
import { Api, TelegramClient, utils } from 'telegram';
import { StringSession } from 'telegram/sessions';
import { RPCError } from 'telegram/errors';
import { Dialog } from 'telegram/tl/custom/dialog';
import type { Entity, EntityLike } from 'telegram/define';
import { PLATFORM_CONNECTION_RETRIES } from '../config/constants.js';
import type { PlatformCredentials } from '../config/credentials.js';
import { ErrorCode, ScrapeError, errorMessage } from '../errors.js';
import type { HistoryFilter, MessagingPlatform, PlatformEntity, PlatformMessage } from './types.js';

export class TelegramEntity implements PlatformEntity {
  readonly id: string;
  readonly title: string;

  constructor(readonly raw: Entity) {
    this.id = raw.id.toString();
    this.title = entityTitle(raw);
  }
}

export class TelegramMessage implements PlatformMessage {
  readonly id: number;
  readonly text: string;
  readonly hasMedia: boolean;

  constructor(readonly raw: Api.Message) {
    this.id = raw.id;
    this.text = raw.message ?? '';
    this.hasMedia = raw.media !== undefined && !(raw.media instanceof Api.MessageMediaEmpty);
  }
}

/**
 * MessagingPlatform backed by an MTProto user session. The session string
 * must already be authorised; this adapter never performs a login.
 */
export class TelegramPlatform implements MessagingPlatform {
  private client: TelegramClient;

  constructor(credentials: PlatformCredentials) {
    this.client = new TelegramClient(
      new StringSession(credentials.session),
      credentials.apiId,
      credentials.apiHash,
      { connectionRetries: PLATFORM_CONNECTION_RETRIES }
    );
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
    } catch (error) {
      throw new ScrapeError(ErrorCode.TRANSPORT_ERROR, `Cannot connect to Telegram: ${errorMessage(error)}`);
    }

    if (!(await this.client.checkAuthorization())) {
      throw new ScrapeError(
        ErrorCode.INVALID_CONFIG,
        'Telegram session is not authorised',
        'Generate a session string from an authorised login and set TG_SESSION'
      );
    }
  }

  async disconnect(): Promise<void> {
    await this.client.destroy();
  }

  async resolveChannel(ref: string): Promise<PlatformEntity> {
    try {
      const entity = await this.client.getEntity(toEntityLike(ref));
      return new TelegramEntity(entity);
    } catch (error) {
      throw toAccessError(error, `Cannot resolve ${ref}`);
    }
  }

  async getMessage(entity: PlatformEntity, messageId: number): Promise<PlatformMessage | null> {
    const target = requireTelegramEntity(entity);
    try {
      const [message] = await this.client.getMessages(target.raw, { ids: messageId });
      return message instanceof Api.Message ? new TelegramMessage(message) : null;
    } catch (error) {
      throw toAccessError(error, `Cannot read message ${messageId} in ${entity.title}`);
    }
  }

  async downloadMedia(message: PlatformMessage, folder: string): Promise<string | null> {
    if (!(message instanceof TelegramMessage)) {
      throw new ScrapeError(ErrorCode.INVALID_LINK, `Message ${message.id} was not loaded through Telegram`);
    }
    if (!message.hasMedia) {
      return null;
    }

    const outputFile = path.join(folder, mediaFileName(message.raw));

    try {
      await fs.mkdir(folder, { recursive: true });
      const written = await this.client.downloadMedia(message.raw, { outputFile });
      return written === undefined ? null : outputFile;
    } catch (error) {
      if (error instanceof RPCError) {
        throw toAccessError(error, `Cannot download media of message ${message.id}`);
      }
      throw new ScrapeError(ErrorCode.TRANSPORT_ERROR, `Media download failed: ${errorMessage(error)}`);
    }
  }

  async *iterHistory(entity: PlatformEntity, filter: HistoryFilter): AsyncIterable<PlatformMessage> {
    const target = requireTelegramEntity(entity);
    try {
      const messages = this.client.iterMessages(target.raw, {
        filter: filter.urlsOnly ? new Api.InputMessagesFilterUrl() : undefined,
      });
      for await (const message of messages) {
        if (message instanceof Api.Message) {
          yield new TelegramMessage(message);
        }
      }
    } catch (error) {
      throw toAccessError(error, `Cannot read history of ${entity.title}`);
    }
  }

  async *iterDialogs(): AsyncIterable<PlatformEntity> {
    try {
      for await (const dialog of this.client.iterDialogs({})) {
        if (dialog instanceof Dialog && (dialog.isChannel || dialog.isGroup) && dialog.entity) {
          yield new TelegramEntity(dialog.entity);
        }
      }
    } catch (error) {
      throw toAccessError(error, 'Cannot list dialogs');
    }
  }
}

// Documents keep their own file name; anything else is named after the message.
export function mediaFileName(message: Api.Message): string {
  return message.file?.name || `${message.id}${utils.getExtension(message.media)}`;
}

// Numeric refs are peer ids; anything else is looked up as a username.
function toEntityLike(ref: string): EntityLike {
  return /^-?\d+$/.test(ref) ? bigInt(ref) : ref.replace(/^@/, '');
}

function requireTelegramEntity(entity: PlatformEntity): TelegramEntity {
  if (!(entity instanceof TelegramEntity)) {
    throw new ScrapeError(ErrorCode.ACCESS_DENIED, `Entity ${entity.id} was not resolved through Telegram`);
  }
  return entity;
}

function entityTitle(entity: Entity): string {
  if (entity instanceof Api.User) {
    return entity.username ?? ([entity.firstName, entity.lastName].filter(Boolean).join(' ') || entity.id.toString());
  }
  if ('title' in entity && typeof entity.title === 'string') {
    return entity.title;
  }
  return entity.id.toString();
}

function toAccessError(error: unknown, prefix: string): ScrapeError {
  if (error instanceof ScrapeError) {
    return error;
  }
  const detail = error instanceof RPCError ? error.errorMessage : errorMessage(error);
  return new ScrapeError(ErrorCode.ACCESS_DENIED, `${prefix}: ${detail}`);
}
