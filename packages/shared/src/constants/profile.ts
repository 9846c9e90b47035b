import type { Address, SocialLinks } from '../types/user.types.js';

export const DEFAULT_SOCIAL_LINKS: SocialLinks = {
  facebook: null,
  twitter: null,
  linkedin: null,
  instagram: null,
  github: null,
};

export const DEFAULT_ADDRESS: Address = {
  street: null,
  city: null,
  state: null,
  country: '',
  postal_code: null,
};
