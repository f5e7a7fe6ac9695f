import { z } from 'zod';

/**
 * Common validation schemas used across the verifier
 */

export const TokenSchema = z.string().min(1, 'token is required');
