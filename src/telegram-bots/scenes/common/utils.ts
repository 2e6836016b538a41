import { cfg } from '@common/config/config.service';
import { escapeHtml } from '@shared/helpers/text.helper';
import type { BotReply } from '../../interfaces/bot-reply.interface';
import type { SceneHandleResult } from './types';

export function isStepOf<TStep extends string>(steps: readonly TStep[], value: unknown): value is TStep {
  return typeof value === 'string' && steps.some((step) => step === value);
}

/** Keeps the user on the same step with the validator's message and the step hint. */
export function repeatStep<TState>(state: TState, error: string, hint: string): SceneHandleResult<TState> {
  return {
    state,
    responses: [{ text: `❌ ${escapeHtml(error)}\n\n${hint}` }],
    completed: false,
  };
}

export function buildSaveFailedReply(subject: string): BotReply {
  const { email, phone } = cfg.business;
  return {
    text:
      `😔 Sorry, we couldn't save your ${subject} right now.\n\n` +
      `Please contact us directly at ${escapeHtml(email)} or ${escapeHtml(phone)}.`,
    markup: { type: 'main_menu' },
  };
}

export const CANCEL_HINT = '<i>Type /cancel at any time to stop.</i>';
