export type Priority = 'HIGH' | 'MEDIUM' | 'LOW';
export type TodoStatus = 'Pending' | 'Completed';
export type CheckInStatus = 'pending' | 'sent' | 'completed' | 'missed' | 'sleeping';
export type ProductivityType = 'aligned' | 'beneficial' | 'wasted' | 'sleeping';

export interface Todo {
  id: number;
  task: string;
  rawInput: string | null;
  category: string | null;
  priority: Priority | null;
  /** `YYYY-MM-DD` */
  dueDate: string | null;
  /** `HH:MM`, 24h */
  dueTime: string | null;
  isScheduled: boolean;
  status: TodoStatus;
  reasoning: string | null;
  recurrence: string | null;
  createdAt: number;
  completedAt: number | null;
  updatedAt: number;
}

/** Normalized output of the triage prompt */
export interface TriageResult {
  taskName: string;
  category: string;
  priority: Priority;
  dueDate: string | null;
  dueTime: string | null;
  recurrence: string | null;
  schedulingUnclear: boolean;
  reasoning: string;
  alignmentScore: number;
  pushback: string | null;
  suggestedAlternative: string | null;
  clarificationNeeded: string | null;
}

export interface ActivityAnalysis {
  activitySummary: string;
  productivityType: ProductivityType;
  matchedTodoId: number | null;
  alignmentScore: number;
  category: string;
  reasoning: string;
  feedback: string;
}

export interface UserConfig {
  chatId: number;
  checkInsEnabled: boolean;
  isSleeping: boolean;
  sleepStartTime: number | null;
  /** `HH:MM` */
  defaultWakeTime: string;
  lastWakeTime: number | null;
  createdAt: number;
  updatedAt: number;
}

export interface CheckIn {
  id: number;
  chatId: number;
  scheduledTime: number;
  sentTime: number | null;
  responseTime: number | null;
  status: CheckInStatus;
  retryCount: number;
}

export interface ProductivityStats {
  totalCheckIns: number;
  respondedCheckIns: number;
  missedCheckIns: number;
  sleepingCheckIns: number;
  alignedActivities: number;
  beneficialActivities: number;
  wastedActivities: number;
  avgAlignmentScore: number | null;
  productivityRatio: number | null;
}

export interface InlineButton {
  text: string;
  callbackData: string;
}

/**
 * @description Outbound channel to a chat. The Telegram bot implements it;
 * background jobs only depend on this interface.
 */
export interface Notifier {
  /** Returns the sent message ID, or null when delivery failed */
  send(chatId: number, text: string, buttons?: InlineButton[][]): Promise<number | null>;
}

/** Chat-facing sender used by the conversation flows */
export interface ChatSender extends Notifier {
  /** Sends with the persistent reply keyboard (rows of button labels) */
  sendWithKeyboard(chatId: number, text: string, keyboard: string[][]): Promise<number | null>;
  /** Replaces the text of an earlier message; sends a new one when the edit fails */
  edit(chatId: number, messageId: number, text: string, buttons?: InlineButton[][]): Promise<void>;
}
