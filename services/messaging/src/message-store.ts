import type { Db } from './db.js';
import type { AttachmentPointer } from './messages.js';

export type MessageState = 'sending' | 'sent' | 'failed' | 'received';
export type AttachmentState = 'pendingUpload' | 'uploaded' | 'pendingDownload' | 'downloaded' | 'failed';

export interface StoredMessage {
  id: number;
  threadId: string;
  author: string;
  body?: string;
  state: MessageState;
  serverHash?: string;
  sentTimestamp: number;
  expiresAt?: number;
  readByRecipient: boolean;
  failureReason?: string;
}

export interface StoredAttachment {
  id: string;
  messageId?: number;
  state: AttachmentState;
  contentType: string;
  byteCount: number;
  serverId?: string;
  url?: string;
  encryptionKey?: string;
  digest?: string;
  data?: Uint8Array;
}

export interface OpenGroupRoom {
  server: string;
  token: string;
  name: string;
  activeUsers: number;
}

export interface OutgoingMessageInput {
  threadId: string;
  author: string;
  body?: string;
  sentTimestamp: number;
  expiresInMs?: number;
  attachments?: { id: string; contentType: string; data: Uint8Array }[];
}

export interface ReceivedMessageInput {
  threadId: string;
  author: string;
  body?: string;
  serverHash: string;
  sentTimestamp: number;
  expiresAt?: number;
  attachments: AttachmentPointer[];
}

interface MessageRow {
  id: number;
  thread_id: string;
  author: string;
  body: string | null;
  state: MessageState;
  server_hash: string | null;
  sent_at: number;
  expires_at: number | null;
  read_by_recipient: number;
  failure_reason: string | null;
}

interface AttachmentRow {
  id: string;
  message_id: number | null;
  state: AttachmentState;
  content_type: string;
  byte_count: number;
  server_id: string | null;
  url: string | null;
  encryption_key: string | null;
  digest: string | null;
  data: Buffer | null;
}

interface RoomRow {
  server: string;
  token: string;
  name: string;
  active_users: number;
}

function rowToMessage(row: MessageRow): StoredMessage {
  return {
    id: row.id,
    threadId: row.thread_id,
    author: row.author,
    body: row.body ?? undefined,
    state: row.state,
    serverHash: row.server_hash ?? undefined,
    sentTimestamp: row.sent_at,
    expiresAt: row.expires_at ?? undefined,
    readByRecipient: row.read_by_recipient === 1,
    failureReason: row.failure_reason ?? undefined,
  };
}

function rowToAttachment(row: AttachmentRow): StoredAttachment {
  return {
    id: row.id,
    messageId: row.message_id ?? undefined,
    state: row.state,
    contentType: row.content_type,
    byteCount: row.byte_count,
    serverId: row.server_id ?? undefined,
    url: row.url ?? undefined,
    encryptionKey: row.encryption_key ?? undefined,
    digest: row.digest ?? undefined,
    data: row.data ? new Uint8Array(row.data) : undefined,
  };
}

export function createMessageStore(db: Db) {
  const insertMessageStmt = db.prepare<[string, string, string | null, MessageState, string | null, number, number | null]>(`
    INSERT INTO messages (thread_id, author, body, state, server_hash, sent_at, expires_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  const insertAttachmentStmt = db.prepare<
    [string, number | null, AttachmentState, string, number, string | null, string | null, string | null, Buffer | null]
  >(`
    INSERT OR IGNORE INTO attachments (id, message_id, state, content_type, byte_count, url, encryption_key, digest, data)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
  `);
  const getMessageStmt = db.prepare<[number], MessageRow>('SELECT * FROM messages WHERE id = ?');
  const byHashStmt = db.prepare<[string], MessageRow>('SELECT * FROM messages WHERE server_hash = ?');
  const byStateStmt = db.prepare<[MessageState], MessageRow>('SELECT * FROM messages WHERE state = ? ORDER BY id');
  const threadStmt = db.prepare<[string], MessageRow>('SELECT * FROM messages WHERE thread_id = ? ORDER BY sent_at, id');
  const markSentStmt = db.prepare<[string, number]>(
    "UPDATE messages SET state = 'sent', server_hash = ?, failure_reason = NULL WHERE id = ?",
  );
  const markFailedStmt = db.prepare<[string, number]>("UPDATE messages SET state = 'failed', failure_reason = ? WHERE id = ?");
  const markReadStmt = db.prepare<[string, number]>(
    'UPDATE messages SET read_by_recipient = 1 WHERE thread_id = ? AND sent_at = ? AND read_by_recipient = 0',
  );
  const deleteExpiredStmt = db.prepare<[number]>('DELETE FROM messages WHERE expires_at IS NOT NULL AND expires_at <= ?');
  const nextExpiryStmt = db.prepare<[], { expires_at: number | null }>(
    'SELECT MIN(expires_at) AS expires_at FROM messages WHERE expires_at IS NOT NULL',
  );
  const latestHashStmt = db.prepare<[], { server_hash: string }>(`
    SELECT server_hash FROM messages
    WHERE state = 'received' AND server_hash IS NOT NULL
    ORDER BY id DESC LIMIT 1
  `);

  const getAttachmentStmt = db.prepare<[string], AttachmentRow>('SELECT * FROM attachments WHERE id = ?');
  const attachmentsForMessageStmt = db.prepare<[number], AttachmentRow>(
    'SELECT * FROM attachments WHERE message_id = ? ORDER BY rowid',
  );
  const attachmentsByStateStmt = db.prepare<[AttachmentState], AttachmentRow>(
    'SELECT * FROM attachments WHERE state = ? ORDER BY rowid',
  );
  const markUploadedStmt = db.prepare<[string, string, string, string, string]>(`
    UPDATE attachments SET state = 'uploaded', server_id = ?, url = ?, encryption_key = ?, digest = ?
    WHERE id = ?
  `);
  const saveDataStmt = db.prepare<[Buffer, number, string]>(
    "UPDATE attachments SET state = 'downloaded', data = ?, byte_count = ? WHERE id = ?",
  );
  const markAttachmentFailedStmt = db.prepare<[string]>("UPDATE attachments SET state = 'failed' WHERE id = ?");
  const deleteOrphansStmt = db.prepare<[]>('DELETE FROM attachments WHERE message_id IS NULL');

  const upsertRoomStmt = db.prepare<[string, string, string, number, number]>(`
    INSERT INTO open_group_rooms (server, token, name, active_users, updated_at)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT (server, token) DO UPDATE SET
      name = excluded.name, active_users = excluded.active_users, updated_at = excluded.updated_at
  `);
  const deleteStaleRoomsStmt = db.prepare<[string, string]>(
    'DELETE FROM open_group_rooms WHERE server = ? AND token NOT IN (SELECT value FROM json_each(?))',
  );
  const listRoomsStmt = db.prepare<[string], RoomRow>('SELECT * FROM open_group_rooms WHERE server = ? ORDER BY token');

  return {
    insertOutgoingMessage(input: OutgoingMessageInput): StoredMessage {
      return db.transaction(() => {
        const expiresAt = input.expiresInMs === undefined ? null : input.sentTimestamp + input.expiresInMs;
        const result = insertMessageStmt.run(
          input.threadId,
          input.author,
          input.body ?? null,
          'sending',
          null,
          input.sentTimestamp,
          expiresAt,
        );
        const messageId = Number(result.lastInsertRowid);
        for (const attachment of input.attachments ?? []) {
          insertAttachmentStmt.run(
            attachment.id,
            messageId,
            'pendingUpload',
            attachment.contentType,
            attachment.data.byteLength,
            null,
            null,
            null,
            Buffer.from(attachment.data),
          );
        }
        const row = getMessageStmt.get(messageId);
        if (!row) throw new Error(`message ${messageId} vanished after insert`);
        return rowToMessage(row);
      })();
    },

    /** Idempotent by server hash: a second delivery of the same message returns the first copy. */
    insertReceivedMessage(input: ReceivedMessageInput): { inserted: boolean; message: StoredMessage } {
      return db.transaction(() => {
        const existing = byHashStmt.get(input.serverHash);
        if (existing) return { inserted: false, message: rowToMessage(existing) };

        const result = insertMessageStmt.run(
          input.threadId,
          input.author,
          input.body ?? null,
          'received',
          input.serverHash,
          input.sentTimestamp,
          input.expiresAt ?? null,
        );
        const messageId = Number(result.lastInsertRowid);
        for (const pointer of input.attachments) {
          insertAttachmentStmt.run(
            pointer.id,
            messageId,
            'pendingDownload',
            pointer.contentType,
            pointer.byteCount,
            pointer.url,
            pointer.key,
            pointer.digest,
            null,
          );
        }
        const row = getMessageStmt.get(messageId);
        if (!row) throw new Error(`message ${messageId} vanished after insert`);
        return { inserted: true, message: rowToMessage(row) };
      })();
    },

    getMessage(id: number): StoredMessage | undefined {
      const row = getMessageStmt.get(id);
      return row ? rowToMessage(row) : undefined;
    },

    messagesInState(state: MessageState): StoredMessage[] {
      return byStateStmt.all(state).map(rowToMessage);
    },

    messagesInThread(threadId: string): StoredMessage[] {
      return threadStmt.all(threadId).map(rowToMessage);
    },

    markMessageSent(id: number, serverHash: string): void {
      markSentStmt.run(serverHash, id);
    },

    markMessageFailed(id: number, reason: string): void {
      markFailedStmt.run(reason, id);
    },

    /** Returns how many messages changed. */
    markReadByRecipient(threadId: string, sentTimestamps: readonly number[]): number {
      let changed = 0;
      for (const timestamp of sentTimestamps) {
        changed += markReadStmt.run(threadId, timestamp).changes;
      }
      return changed;
    },

    latestReceivedHash(): string | undefined {
      return latestHashStmt.get()?.server_hash;
    },

    deleteExpiredMessages(now: number): number {
      return deleteExpiredStmt.run(now).changes;
    },

    nextExpiry(): number | undefined {
      return nextExpiryStmt.get()?.expires_at ?? undefined;
    },

    getAttachment(id: string): StoredAttachment | undefined {
      const row = getAttachmentStmt.get(id);
      return row ? rowToAttachment(row) : undefined;
    },

    attachmentsForMessage(messageId: number): StoredAttachment[] {
      return attachmentsForMessageStmt.all(messageId).map(rowToAttachment);
    },

    attachmentsInState(state: AttachmentState): StoredAttachment[] {
      return attachmentsByStateStmt.all(state).map(rowToAttachment);
    },

    markAttachmentUploaded(id: string, upload: { serverId: string; url: string; key: string; digest: string }): void {
      markUploadedStmt.run(upload.serverId, upload.url, upload.key, upload.digest, id);
    },

    saveAttachmentData(id: string, data: Uint8Array): void {
      saveDataStmt.run(Buffer.from(data), data.byteLength, id);
    },

    markAttachmentFailed(id: string): void {
      markAttachmentFailedStmt.run(id);
    },

    /** Attachments whose message was deleted. */
    deleteOrphanedAttachments(): number {
      return deleteOrphansStmt.run().changes;
    },

    /** Replace the stored room list for `server`. */
    replaceOpenGroupRooms(server: string, rooms: readonly Omit<OpenGroupRoom, 'server'>[], now: number): void {
      db.transaction(() => {
        for (const room of rooms) {
          upsertRoomStmt.run(server, room.token, room.name, room.activeUsers, now);
        }
        deleteStaleRoomsStmt.run(server, JSON.stringify(rooms.map((room) => room.token)));
      })();
    },

    listOpenGroupRooms(server: string): OpenGroupRoom[] {
      return listRoomsStmt.all(server).map((row) => ({
        server: row.server,
        token: row.token,
        name: row.name,
        activeUsers: row.active_users,
      }));
    },

    /** Runs `fn` atomically with anything else on this database, the job queue included. */
    transaction<T>(fn: () => T): T {
      return db.transaction(fn)();
    },
  };
}

export type MessageStore = ReturnType<typeof createMessageStore>;
