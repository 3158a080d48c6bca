export const toAllowSet = (userIds: readonly number[]): ReadonlySet<number> => new Set(userIds);

export const isUserAuthorized = (allowed: ReadonlySet<number>, userId: number): boolean =>
  allowed.has(userId);
