export { DirectMessageScene } from './direct-message.scene';
export { MESSAGE_STEPS } from './types';
export type { MessageState, MessageStep } from './types';
