import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import type { CredentialSources } from "../config";

export interface TokenLookupContext {
  sources: CredentialSources;
  /** Home directory used for the default config dir and fallback files */
  homeDir: string;
  /** Plain-text token files tried last, in order */
  fallbackPaths: string[];
}

export interface TokenLookup {
  /** Short description of the source, for logs */
  name: string;
  lookup: (ctx: TokenLookupContext) => Promise<string | null>;
}

/** Remote/container session token files, tried in order. */
export function defaultFallbackPaths(home: string = homedir()): string[] {
  return [
    join(home, ".claude", "remote", ".session_ingress_token"),
    "/home/claude/.claude/remote/.session_ingress_token",
    "/root/.claude/remote/.session_ingress_token",
  ];
}

async function readTrimmed(path: string): Promise<string | null> {
  try {
    const token = (await readFile(path, "utf-8")).trim();
    return token || null;
  } catch {
    return null;
  }
}

function stringField(value: unknown, key: string): string | null {
  if (typeof value !== "object" || value === null) return null;
  const field: unknown = Reflect.get(value, key);
  return typeof field === "string" && field.trim() ? field.trim() : null;
}

/**
 * Token lookups in priority order. Explicit override first, then
 * process-supplied sources, then the local credentials file, then
 * remote fallback files. Order is significant.
 */
export const TOKEN_LOOKUPS: readonly TokenLookup[] = [
  {
    name: "explicit override",
    lookup: async ({ sources }) => sources.token?.trim() || null,
  },
  {
    name: "token file",
    lookup: async ({ sources }) => (sources.tokenFile ? readTrimmed(sources.tokenFile) : null),
  },
  {
    name: "file descriptor",
    lookup: async ({ sources }) => {
      if (!sources.tokenFd || !/^\d+$/.test(sources.tokenFd.trim())) return null;
      // Opening /dev/fd/<n> leaves the inherited descriptor itself open
      return readTrimmed(`/dev/fd/${Number(sources.tokenFd.trim())}`);
    },
  },
  {
    name: "credentials file",
    lookup: async ({ sources, homeDir }) => {
      const configDir = sources.configDir ?? join(homeDir, ".claude");
      let creds: unknown;
      try {
        creds = JSON.parse(await readFile(join(configDir, ".credentials.json"), "utf-8"));
      } catch {
        return null;
      }
      return (
        stringField(creds, "accessToken") ??
        stringField(creds, "access_token") ??
        stringField(
          typeof creds === "object" && creds !== null ? Reflect.get(creds, "claudeAiOauth") : null,
          "accessToken",
        )
      );
    },
  },
  {
    name: "fallback token file",
    lookup: async ({ fallbackPaths }) => {
      for (const path of fallbackPaths) {
        const token = await readTrimmed(path);
        if (token) return token;
      }
      return null;
    },
  },
];

export interface FoundToken {
  token: string;
  source: string;
}

/**
 * Walk {@link TOKEN_LOOKUPS} in order and return the first non-empty token.
 * Every failing step falls through to the next; returns null when all fail.
 */
export async function findOAuthToken(
  sources: CredentialSources,
  options: { homeDir?: string; fallbackPaths?: string[] } = {},
): Promise<FoundToken | null> {
  const homeDir = options.homeDir ?? homedir();
  const ctx: TokenLookupContext = {
    sources,
    homeDir,
    fallbackPaths: options.fallbackPaths ?? defaultFallbackPaths(homeDir),
  };

  for (const { name, lookup } of TOKEN_LOOKUPS) {
    const token = await lookup(ctx);
    if (token) return { token, source: name };
  }
  return null;
}
