import path from "path";
import { z } from "zod";
import { DEFAULT_PORT, TRANSFER_STRATEGIES } from "blobshard-protocol";

export interface PeerAddress {
  host: string;
  port: number;
}

const PortSchema = z.coerce.number().int().min(0).max(65535);

/**
 * Split "host:port" on its last colon. IPv6 hosts go in brackets: "[::1]:8080".
 */
export function parsePeerAddress(value: string): PeerAddress {
  const separator = value.lastIndexOf(":");
  if (separator <= 0 || separator === value.length - 1) {
    throw new Error(`Peer must be host:port, got "${value}"`);
  }
  const host = value.slice(0, separator).replace(/^\[(.*)\]$/, "$1");
  const port = Number(value.slice(separator + 1));
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Peer port must be between 1 and 65535, got "${value.slice(separator + 1)}"`);
  }
  return { host, port };
}

export const ListenOptionsSchema = z.object({
  port: PortSchema.default(DEFAULT_PORT),
  outputDir: z
    .string()
    .min(1)
    .default(".")
    .transform((dir) => path.resolve(dir)),
  verifyHandshake: z.boolean().default(false),
  resetOnFailure: z.boolean().default(false),
});
export type ListenOptions = z.infer<typeof ListenOptionsSchema>;

export const SendOptionsSchema = z.object({
  peer: z.string().transform((value, ctx) => {
    try {
      return parsePeerAddress(value);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  }),
  file: z.string().min(1),
  mode: z.enum(TRANSFER_STRATEGIES),
  // Accepted for compatibility; the peer address carries the port
  port: PortSchema.optional(),
});
export type SendOptions = z.infer<typeof SendOptionsSchema>;

/** Validate raw commander options; throws one Error listing every problem. */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `--${kebab(issue.path.join("."))}: ${issue.message}` : issue.message,
    );
    throw new Error(`Invalid options: ${problems.join("; ")}`);
  }
  return result.data;
}

function kebab(name: string): string {
  return name.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);
}
