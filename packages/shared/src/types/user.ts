export type PreferredUnits = 'metric' | 'imperial';

export interface User {
  id: string;
  email: string;
  name: string;
  username: string;
  avatarUrl?: string;
  emailVerified: boolean;
  preferredUnits: PreferredUnits;
  timezone: string;
  created?: string;
  updated?: string;
}
