// validation/authSchemas.ts
import { z } from 'zod';
import { requiredText } from './shared.ts';

export const authValidationSchemas = {
  /**
   * POST /api/register - Create an account and open a session
   */
  register: {
    body: z
      .object({
        name: requiredText('Name', 255),
        email: z
          .string()
          .trim()
          .email('Email must be a valid email address')
          .max(255, 'Email must not exceed 255 characters'),
        password: z.string().min(8, 'Password must be at least 8 characters'),
        passwordConfirmation: z.string(),
        nickname: z
          .string()
          .max(255, 'Nickname must not exceed 255 characters')
          .nullable()
          .optional(),
        anonymous: z.boolean().optional(),
      })
      .refine((data) => data.password === data.passwordConfirmation, {
        message: 'The password confirmation does not match.',
        path: ['passwordConfirmation'],
      }),
  },

  /**
   * POST /api/login - Exchange credentials for a bearer token
   */
  login: {
    body: z.object({
      email: z.string().trim().email('Email must be a valid email address'),
      password: z.string().min(1, 'Password is required'),
    }),
  },
};
