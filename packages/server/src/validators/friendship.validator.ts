import { z } from 'zod';
import { PAGE_NUMBER_MAX, PAGE_SIZE_DEFAULT, PAGE_SIZE_MAX } from '@notesnest/shared';

export const friendRequestSchema = z.object({
  addressee_id: z.number().int().positive('Addressee ID must be positive'),
});

// The action is matched case-insensitively by the service
export const respondRequestSchema = z.object({
  action: z.string(),
});

export const friendsListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).max(PAGE_NUMBER_MAX).default(1),
  per_page: z.coerce.number().int().min(1).max(PAGE_SIZE_MAX).default(PAGE_SIZE_DEFAULT),
});

export type FriendRequestInput = z.infer<typeof friendRequestSchema>;
export type RespondRequestInput = z.infer<typeof respondRequestSchema>;
export type FriendsListQuery = z.infer<typeof friendsListQuerySchema>;
