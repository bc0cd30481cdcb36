import { resolveAccess } from '../access';

describe('resolveAccess', () => {
  it('should reject group chats even for listed users', () => {
    expect(resolveAccess('group', 42, [42])).toBe('privateOnly');
    expect(resolveAccess('supergroup', 42, [])).toBe('privateOnly');
    expect(resolveAccess(undefined, 42, [])).toBe('privateOnly');
  });

  it('should reject users missing from the allow list', () => {
    expect(resolveAccess('private', 7, [42, 43])).toBe('denied');
  });

  it('should admit anyone in a private chat when the list is empty', () => {
    expect(resolveAccess('private', 7, [])).toBe('allowed');
  });

  it('should admit listed users', () => {
    expect(resolveAccess('private', 43, [42, 43])).toBe('allowed');
  });

  it('should reject updates without a sender', () => {
    expect(resolveAccess('private', undefined, [])).toBe('denied');
  });
});
