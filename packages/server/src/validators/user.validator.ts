import { z } from 'zod';
import { USER_ROLES } from '@notesnest/shared';
import { passwordPolicyViolation } from '../utils/password.js';

/**
 * User validation schemas
 */

const usernameField = z.string().trim().min(1, 'Username is required').max(50, 'Username too long');
const emailField = z.string().trim().email('Invalid email address');
const nameField = z.string().trim().min(1, 'Name is required').max(100, 'Name too long');
const ageField = z.number().int().min(0).max(150).nullable();
const bioField = z.string().max(1000).nullable();

const passwordField = z.string().superRefine((password, ctx) => {
  const violation = passwordPolicyViolation(password);
  if (violation) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: violation });
  }
});

const linkField = z.string().max(255).nullable().optional();

export const socialLinksSchema = z.object({
  facebook: linkField,
  twitter: linkField,
  linkedin: linkField,
  instagram: linkField,
  github: linkField,
});

export const addressSchema = z.object({
  street: linkField,
  city: linkField,
  state: linkField,
  country: linkField,
  postal_code: z.string().max(20).nullable().optional(),
});

export const createUserSchema = z.object({
  username: usernameField,
  email: emailField,
  name: nameField,
  password: passwordField,
  age: ageField.optional(),
  bio: bioField.optional(),
});

export const updateUserSchema = z.object({
  username: usernameField.optional(),
  email: emailField.optional(),
  name: nameField.optional(),
  age: ageField.optional(),
  bio: bioField.optional(),
  social_links: socialLinksSchema.optional(),
  address: addressSchema.optional(),
});

export const roleUpdateSchema = z.object({
  role: z.enum(USER_ROLES),
});

export const verifyEmailParamsSchema = z.object({
  token: z.string().min(1),
});

export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
export type RoleUpdateInput = z.infer<typeof roleUpdateSchema>;
