import type { RawUser } from '../raw/index.js';

export interface User {
  id: number;
  isSelf: boolean;
  isContact: boolean;
  isBot: boolean;
  isDeleted: boolean;
  isVerified: boolean;
  isPremium: boolean;
  isScam: boolean;
  isFake: boolean;
  firstName?: string;
  lastName?: string;
  username?: string;
  languageCode?: string;
  phoneNumber?: string;
}

/** Map a raw user record; empty and missing records give null */
export function parseUser(user: RawUser | undefined): User | null {
  if (!user || user._ === 'userEmpty') return null;

  const parsed: User = {
    id: user.id,
    isSelf: !!user.self,
    isContact: !!user.contact,
    isBot: !!user.bot,
    isDeleted: !!user.deleted,
    isVerified: !!user.verified,
    isPremium: !!user.premium,
    isScam: !!user.scam,
    isFake: !!user.fake,
  };

  if (user.first_name !== undefined) parsed.firstName = user.first_name;
  if (user.last_name !== undefined) parsed.lastName = user.last_name;
  if (user.username !== undefined) parsed.username = user.username;
  if (user.lang_code !== undefined) parsed.languageCode = user.lang_code;
  if (user.phone !== undefined) parsed.phoneNumber = user.phone;

  return parsed;
}

/** Parse every id that resolves to a user, skipping the ones missing from the table */
export function parseUsers(ids: number[], users: Map<number, RawUser>): User[] {
  const parsed: User[] = [];
  for (const id of ids) {
    const user = parseUser(users.get(id));
    if (user) parsed.push(user);
  }
  return parsed;
}
