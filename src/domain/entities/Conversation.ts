export type MessageRole = 'user' | 'assistant';

export interface Conversation {
  conversationId: number;
  userId: number;
  title: string | null;
  createdAt: number;
}

export interface Message {
  messageId: number;
  conversationId: number;
  role: MessageRole;
  content: string;
  createdAt: number;
}
