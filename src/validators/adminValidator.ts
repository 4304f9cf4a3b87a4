import { z } from 'zod';
import { MIN_PASSWORD_LENGTH } from '../services/adminCredentials';

const USERNAME_PATTERN = /^[A-Za-z0-9_.-]+$/;

const usernameSchema = z
  .string()
  .trim()
  .min(1, 'Username is required')
  .max(64, 'Username must not exceed 64 characters')
  .regex(USERNAME_PATTERN, 'Username may only contain letters, digits, dots, dashes and underscores');

const passwordSchema = z
  .string()
  .min(MIN_PASSWORD_LENGTH, `Password must be at least ${MIN_PASSWORD_LENGTH} characters`)
  .max(256, 'Password must not exceed 256 characters');

const totpCodeSchema = z
  .string()
  .trim()
  .regex(/^\d{6}$/, 'Code must be 6 digits');

export const loginSchema = z.object({
  username: z.string().trim().min(1, 'Username is required'),
  password: z.string().min(1, 'Password is required'),
  totpCode: totpCodeSchema.optional(),
});

export const createUserSchema = z
  .object({
    username: usernameSchema,
    password: passwordSchema,
  })
  .strict();

export const resetPasswordSchema = z
  .object({
    password: passwordSchema,
  })
  .strict();

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1, 'Current password is required'),
  newPassword: passwordSchema,
});

export const totpVerifySchema = z.object({
  code: totpCodeSchema,
});

export const totpDisableSchema = z.object({
  password: z.string().min(1, 'Password is required'),
});

export const usernameParamSchema = z.object({
  username: usernameSchema,
});
