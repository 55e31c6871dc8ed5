export interface AnswerSource {
  id: string;
  source: string;
  score: number;
}

export interface AskResponse {
  answer: string;
  conversationId: number;
  username: string;
  sources: AnswerSource[];
}
