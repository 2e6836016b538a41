import type { BotReply } from '../../interfaces/bot-reply.interface';

export interface SceneContext {
  chatId: string;
  now: Date;
}

export interface SceneHandleResult<TState> {
  state: TState;
  responses: BotReply[];
  /** The flow is over (saved, or abandoned after a failure); the session is cleared. */
  completed: boolean;
}

export interface ConversationScene<TState> {
  getInitialState(): TState;
  start(): SceneHandleResult<TState>;
  handleMessage(state: TState, rawMessage: string, context: SceneContext): Promise<SceneHandleResult<TState>>;
}
