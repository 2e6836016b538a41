const SKIP_ANSWERS = ['skip', 'none', 'personal', '-'];

export function isSkipAnswer(value: string): boolean {
  return SKIP_ANSWERS.includes(value.trim().toLowerCase());
}

export function isEmail(contact: string): boolean {
  return contact.includes('@');
}

export function formatContactDisplay(contact: string): string {
  return isEmail(contact) ? `📧 ${contact}` : `📞 ${contact}`;
}

/** Escapes the characters Telegram's HTML parse mode treats as markup. */
export function escapeHtml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? `${value.slice(0, maxLength)}...` : value;
}
