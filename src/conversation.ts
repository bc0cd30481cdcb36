/** Where a chat is in a multi-step flow */
export type ConversationState =
  | { kind: 'idle' }
  | { kind: 'awaitingAddTask' }
  | { kind: 'awaitingQuery' }
  | { kind: 'awaitingSchedule' }
  | { kind: 'awaitingDoneId' }
  | { kind: 'awaitingDoneSearch' }
  | { kind: 'awaitingEditId' }
  | { kind: 'awaitingEditSearch' }
  | { kind: 'awaitingEditInstruction'; todoId: number }
  | { kind: 'awaitingCompletionTime'; todoId: number }
  | { kind: 'awaitingClarification'; todoId: number };

const idle: ConversationState = { kind: 'idle' };

/** In-memory conversation state per chat; a restart resets every chat to idle */
export class ConversationStore {
  private readonly states = new Map<number, ConversationState>();

  get(chatId: number): ConversationState {
    return this.states.get(chatId) ?? idle;
  }

  set(chatId: number, state: ConversationState): void {
    if (state.kind === 'idle') {
      this.states.delete(chatId);
    } else {
      this.states.set(chatId, state);
    }
  }

  reset(chatId: number): void {
    this.states.delete(chatId);
  }

  /** Busy chats get their check-in postponed */
  checkIsBusy(chatId: number): boolean {
    return this.get(chatId).kind !== 'idle';
  }
}
