/**
 * @dockhand/shared - Parameter Zod Schemas
 */

import { z } from 'zod';
import { APP_NAME_PATTERN, DEFAULT_BRANCH } from '../constants/index.js';

export const appNameSchema = z
  .string()
  .trim()
  .min(1, 'Application name cannot be empty')
  .max(128)
  .regex(APP_NAME_PATTERN, 'Application name may only contain letters, digits, ".", "_" and "-"');

export const portSchema = z
  .string()
  .trim()
  .min(1, 'Application port cannot be empty')
  .pipe(
    z.coerce
      .number({ invalid_type_error: 'Application port must be a number' })
      .int('Application port must be an integer')
      .min(1, 'Application port must be between 1 and 65535')
      .max(65535, 'Application port must be between 1 and 65535'),
  );

export const repoUrlSchema = z
  .string()
  .trim()
  .min(1, 'Git repository URL cannot be empty')
  .url('Git repository URL must be a valid URL')
  .refine((value) => /^https?:\/\//i.test(value), 'Git repository URL must use http or https');

const requiredText = (label: string) => z.string().trim().min(1, `${label} cannot be empty`);

/**
 * Field schemas for the answers of the deploy prompts. Each one takes the raw
 * answer text; `appPort` comes out as a number and `branch` falls back to
 * the default when no answer is given.
 */
export const deploymentParametersSchema = z.object({
  repoUrl: repoUrlSchema,
  token: requiredText('Personal access token'),
  branch: requiredText('Branch').default(DEFAULT_BRANCH),
  sshUser: requiredText('SSH username'),
  serverAddress: requiredText('Server address'),
  sshKeyPath: requiredText('SSH key path'),
  appPort: portSchema,
  appName: appNameSchema,
});

export const cleanupTargetSchema = z.object({
  serverAddress: requiredText('Server address'),
  sshUser: requiredText('SSH username'),
  sshKeyPath: requiredText('SSH key path'),
  appName: appNameSchema,
});
