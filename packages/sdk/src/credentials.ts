/**
 * Credential resolution from the environment, falling back to interactive prompts
 */

import { MissingCredentialError } from "./errors.js";

export type Credentials =
  | { kind: "basic"; principal: string; secret: string }
  | { kind: "token"; token: string };

/**
 * Where a service's credentials come from
 */
export type CredentialSource =
  | { kind: "basic"; service: string; principalEnv: string; secretEnv: string }
  | { kind: "token"; service: string; tokenEnv: string };

/**
 * Interactive input. `askSecret` must not echo what is typed.
 */
export interface Prompter {
  ask(question: string): Promise<string>;
  askSecret(question: string): Promise<string>;
}

export interface ResolveCredentialsOptions {
  env: Record<string, string | undefined>;
  /** Omitted when no terminal is attached; missing values then fail immediately */
  prompter?: Prompter;
}

function fromEnv(env: ResolveCredentialsOptions["env"], name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

async function obtain(
  service: string,
  variable: string,
  options: ResolveCredentialsOptions,
  masked: boolean
): Promise<string> {
  const present = fromEnv(options.env, variable);
  if (present) {
    return present;
  }

  const { prompter } = options;
  if (!prompter) {
    throw new MissingCredentialError(service, variable);
  }

  const question = `${service} ${variable}: `;
  const answer = (masked ? await prompter.askSecret(question) : await prompter.ask(question)).trim();
  if (!answer) {
    throw new MissingCredentialError(service, variable);
  }
  return answer;
}

/**
 * Resolve credentials for a service. Prompts only for what the environment lacks.
 */
export async function resolveCredentials(
  source: CredentialSource,
  options: ResolveCredentialsOptions
): Promise<Credentials> {
  if (source.kind === "token") {
    const token = await obtain(source.service, source.tokenEnv, options, true);
    return { kind: "token", token };
  }

  const principal = await obtain(source.service, source.principalEnv, options, false);
  const secret = await obtain(source.service, source.secretEnv, options, true);
  return { kind: "basic", principal, secret };
}

/**
 * Build the Authorization header value for resolved credentials
 */
export function authorizationHeader(credentials: Credentials): string {
  if (credentials.kind === "token") {
    return `Bearer ${credentials.token}`;
  }
  const encoded = Buffer.from(`${credentials.principal}:${credentials.secret}`, "utf8").toString(
    "base64"
  );
  return `Basic ${encoded}`;
}

/**
 * Names of the environment variables a source reads
 */
export function credentialVariables(source: CredentialSource): string[] {
  return source.kind === "token" ? [source.tokenEnv] : [source.principalEnv, source.secretEnv];
}
