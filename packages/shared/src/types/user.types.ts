export const USER_ROLES = ['user', 'admin'] as const;

/**
 * Account role
 */
export type UserRole = (typeof USER_ROLES)[number];

export interface SocialLinks {
  facebook: string | null;
  twitter: string | null;
  linkedin: string | null;
  instagram: string | null;
  github: string | null;
}

export interface Address {
  street: string | null;
  city: string | null;
  state: string | null;
  country: string | null;
  postal_code: string | null;
}

/**
 * Public representation of a user account
 */
export interface UserRead {
  id: number;
  username: string;
  email: string;
  name: string;
  age: number | null;
  bio: string | null;
  is_active: boolean;
  is_email_verified: boolean;
  role: UserRole;
  social_links: SocialLinks;
  address: Address;
  created_at: string;
  updated_at: string;
}
