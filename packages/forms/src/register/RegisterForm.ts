import { z } from 'zod';
import {
  DraftTransformer,
  HttpSubmitter,
  JsonResponseMapper,
  ScryptSecretHasher,
  SubmissionPipeline,
  matchesField,
  type FormSchema,
  type HttpClient,
  type SecretHasher,
  type TransformedFields,
} from '@submitflow/core';

const normalize = (value: unknown): string => String(value).trim().toLowerCase();

/** Fields of the sign-up form. `confirmPassword` is checked but never sent. */
export const registerSchema: FormSchema = {
  fields: [
    {
      name: 'username',
      type: 'string',
      required: true,
      minLength: 3,
      maxLength: 32,
      pattern: /^[A-Za-z0-9_]+$/,
      aliases: ['login', 'user_name'],
      transform: normalize,
    },
    { name: 'email', type: 'email', required: true, aliases: ['mail'], transform: normalize },
    { name: 'password', type: 'string', required: true, minLength: 8, secret: true },
    {
      name: 'confirmPassword',
      type: 'string',
      required: true,
      label: 'password confirmation',
      aliases: ['password_confirmation'],
      rules: [matchesField('password', 'Passwords do not match')],
      submit: false,
    },
  ],
};

/** Body of `POST /users/register`. `password` holds the hash, never the plain secret. */
export interface RegisterRequest {
  readonly username: string;
  readonly email: string;
  readonly password: string;
}

export const RegisteredUserSchema = z.object({
  id: z.string().min(1),
  username: z.string(),
});

export type RegisteredUser = z.infer<typeof RegisteredUserSchema>;

export interface RegisterPipelineConfig {
  readonly client: HttpClient;
  /** Default: `ScryptSecretHasher` with its default cost. */
  readonly hasher?: SecretHasher;
  /** Default: `'/users/register'`. */
  readonly path?: string;
}

export function toRegisterRequest(fields: TransformedFields): RegisterRequest {
  return {
    username: String(fields['username']),
    email: String(fields['email']),
    password: String(fields['password']),
  };
}

/** Assemble the sign-up pipeline. */
export function createRegisterPipeline(
  config: RegisterPipelineConfig,
): SubmissionPipeline<RegisterRequest, RegisteredUser> {
  return new SubmissionPipeline({
    schema: registerSchema,
    transformer: new DraftTransformer({
      schema: registerSchema,
      hasher: config.hasher ?? new ScryptSecretHasher(),
      shape: toRegisterRequest,
    }),
    submitter: new HttpSubmitter({
      client: config.client,
      path: config.path ?? '/users/register',
      responseMapper: new JsonResponseMapper(RegisteredUserSchema),
    }),
  });
}
