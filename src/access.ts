export type AccessDecision = 'allowed' | 'privateOnly' | 'denied';

/**
 * @description Who may talk to the bot: private chats only, and only the
 * listed users when `allowedUsers` is not empty.
 */
export function resolveAccess(chatType: string | undefined, userId: number | undefined, allowedUsers: number[]): AccessDecision {
  if (chatType !== 'private') return 'privateOnly';
  if (userId === undefined) return 'denied';
  if (allowedUsers.length > 0 && !allowedUsers.includes(userId)) return 'denied';
  return 'allowed';
}
