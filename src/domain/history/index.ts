export { fingerprintQuestion } from './fingerprint';
export type { HistoryDocument } from './QuestionHistoryStore';
export { QuestionHistoryStore } from './QuestionHistoryStore';
