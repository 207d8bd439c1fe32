import { z } from 'zod';

const envNameSchema = z
  .string()
  .min(1)
  .regex(/^[A-Z_][A-Z0-9_]*$/, 'Environment variable names must be uppercase snake_case');

export const triggerSchema = z
  .object({
    push: z
      .object({
        branches: z.array(z.string().min(1)).default(['dev'])
      })
      .default({}),
    pullRequest: z.boolean().default(true)
  })
  .default({});

export const checkoutConfigSchema = z
  .object({
    fetchDepth: z.number().int().positive().default(1),
    clean: z.boolean().default(true)
  })
  .default({});

export const toolchainConfigSchema = z
  .object({
    channel: z.string().min(1).default('stable'),
    profile: z.enum(['minimal', 'default', 'complete']).default('minimal'),
    targets: z.array(z.string().min(1)).default([]),
    components: z.array(z.string().min(1)).default([])
  })
  .default({});

export const buildConfigSchema = z
  .object({
    script: z.string().min(1).default('crates/wasm/build-docs.sh'),
    args: z.array(z.string()).default([])
  })
  .default({});

export const publishConfigSchema = z
  .object({
    branch: z.string().min(1).default('dev'),
    publishDir: z.string().min(1).default('target/wasm32-unknown-unknown/doc/'),
    targetBranch: z.string().min(1).default('gh-pages'),
    tokenEnv: envNameSchema.default('GITHUB_TOKEN'),
    keepFiles: z.boolean().default(false),
    nojekyll: z.boolean().default(true),
    cname: z.string().min(1).nullable().default(null),
    commitMessage: z.string().min(1).nullable().default(null),
    userName: z.string().min(1).default('github-actions[bot]'),
    userEmail: z.string().min(1).default('41898282+github-actions[bot]@users.noreply.github.com')
  })
  .default({});

export const workflowConfigSchema = z.object({
  name: z.string().min(1).default('rustdoc'),
  on: triggerSchema,
  env: z.record(envNameSchema, z.string()).default({
    CARGO_TERM_COLOR: 'always',
    CARGO_REGISTRIES_CRATES_IO_PROTOCOL: 'sparse'
  }),
  checkout: checkoutConfigSchema,
  toolchain: toolchainConfigSchema,
  build: buildConfigSchema,
  publish: publishConfigSchema
});
