import type Database from 'better-sqlite3';
import type { Conversation, Message, MessageRole } from '../domain/entities/Conversation.js';
import { ConversationNotFoundError, UserNotFoundError } from '../domain/errors/DomainErrors.js';

interface ConversationRow {
  conversation_id: number;
  user_id: number;
  title: string | null;
  created_at: number;
}

interface MessageRow {
  message_id: number;
  conversation_id: number;
  role: MessageRole;
  content: string;
  created_at: number;
}

function toConversation(r: ConversationRow): Conversation {
  return {
    conversationId: r.conversation_id,
    userId: r.user_id,
    title: r.title,
    createdAt: r.created_at,
  };
}

function toMessage(r: MessageRow): Message {
  return {
    messageId: r.message_id,
    conversationId: r.conversation_id,
    role: r.role,
    content: r.content,
    createdAt: r.created_at,
  };
}

/**
 * 對話歷史：users / conversations / messages 三表 CRUD
 *
 * 使用者只以 username 識別，身分驗證不在此處理。
 */
export class ConversationUseCase {
  constructor(private readonly db: Database.Database) {}

  /** 取得或建立使用者，回傳 user_id */
  getOrCreateUser(username: string): number {
    const normalized = username.trim();
    if (!normalized) {
      throw new Error('username must not be empty');
    }

    const existing = this.findUserId(normalized);
    if (existing !== undefined) return existing;

    const result = this.db.prepare(
      'INSERT INTO users (username, created_at) VALUES (?, ?)',
    ).run(normalized, Date.now());
    return Number(result.lastInsertRowid);
  }

  findUserId(username: string): number | undefined {
    const row = this.db.prepare(
      'SELECT user_id FROM users WHERE username = ?',
    ).get(username.trim()) as { user_id: number } | undefined;
    return row?.user_id;
  }

  createConversation(userId: number, title?: string): Conversation {
    const now = Date.now();
    const result = this.db.prepare(
      'INSERT INTO conversations (user_id, title, created_at) VALUES (?, ?, ?)',
    ).run(userId, title ?? null, now);

    return {
      conversationId: Number(result.lastInsertRowid),
      userId,
      title: title ?? null,
      createdAt: now,
    };
  }

  getConversation(conversationId: number): Conversation | undefined {
    const row = this.db.prepare(
      'SELECT conversation_id, user_id, title, created_at FROM conversations WHERE conversation_id = ?',
    ).get(conversationId) as ConversationRow | undefined;
    return row ? toConversation(row) : undefined;
  }

  /** 確認對話存在且屬於該使用者 */
  requireOwnedConversation(userId: number, conversationId: number): Conversation {
    const conversation = this.getConversation(conversationId);
    if (!conversation || conversation.userId !== userId) {
      throw new ConversationNotFoundError(conversationId);
    }
    return conversation;
  }

  addMessage(conversationId: number, role: MessageRole, content: string): Message {
    if (!this.getConversation(conversationId)) {
      throw new ConversationNotFoundError(conversationId);
    }

    const now = Date.now();
    const result = this.db.prepare(
      'INSERT INTO messages (conversation_id, role, content, created_at) VALUES (?, ?, ?, ?)',
    ).run(conversationId, role, content, now);

    return {
      messageId: Number(result.lastInsertRowid),
      conversationId,
      role,
      content,
      createdAt: now,
    };
  }

  /** 列出使用者的對話（新到舊） */
  listConversations(username: string): Conversation[] {
    const userId = this.findUserId(username);
    if (userId === undefined) throw new UserNotFoundError(username);

    const rows = this.db.prepare(
      `SELECT conversation_id, user_id, title, created_at
       FROM conversations
       WHERE user_id = ?
       ORDER BY created_at DESC, conversation_id DESC`,
    ).all(userId) as ConversationRow[];

    return rows.map(toConversation);
  }

  /** 取得對話訊息（依時間先後） */
  getMessages(username: string, conversationId: number): Message[] {
    const userId = this.findUserId(username);
    if (userId === undefined) throw new UserNotFoundError(username);
    this.requireOwnedConversation(userId, conversationId);

    const rows = this.db.prepare(
      `SELECT message_id, conversation_id, role, content, created_at
       FROM messages
       WHERE conversation_id = ?
       ORDER BY created_at ASC, message_id ASC`,
    ).all(conversationId) as MessageRow[];

    return rows.map(toMessage);
  }

  /** 刪除對話；messages 由 FK cascade 一併刪除 */
  deleteConversation(conversationId: number): boolean {
    const result = this.db.prepare(
      'DELETE FROM conversations WHERE conversation_id = ?',
    ).run(conversationId);
    return result.changes > 0;
  }
}
