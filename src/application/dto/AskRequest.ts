export interface AskRequest {
  question: string;
  /** 預設 'default_user' */
  username?: string;
  /** 省略時建立新對話 */
  conversationId?: number;
  topK?: number;
}
