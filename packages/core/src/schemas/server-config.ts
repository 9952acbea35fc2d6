import { keccak256, toHex } from "viem";
import { z } from "zod";

import { RESOLVER_KINDS } from "../variants/types.js";

import { addressSchema, bytes32Schema } from "./primitives.js";

export const DEFAULT_SCHEMA_ID = keccak256(toHex("docclaims.capability.v1"));

export const DEFAULTS = {
  server: {
    port: 8080,
    origin: "http://localhost:8080",
  },
  logging: {
    level: "info" as const,
    pretty: false,
  },
  attestations: {
    url: "http://localhost:8090",
    schemaId: DEFAULT_SCHEMA_ID,
    timeoutMs: 5000,
  },
  credentials: {
    enabled: false,
    url: "http://localhost:8091",
    timeoutMs: 5000,
  },
  ledger: {
    maxLabelBytes: 1024,
    chainId: 1,
  },
  roles: {
    governors: [],
    executors: [],
    reservers: [],
    administrators: [],
  },
  resolvers: [{ id: "default", kind: "standard" as const }],
};

const addressListSchema = z.array(addressSchema).default([]);

export const ResolverConfigSchema = z.object({
  id: z
    .string()
    .regex(/^[a-z0-9][a-z0-9-]*$/, "Resolver ids are lowercase letters, digits and dashes"),
  kind: z.enum(RESOLVER_KINDS),
});

export const ServerConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(1).max(65535).default(DEFAULTS.server.port),
      origin: z.url().default(DEFAULTS.server.origin),
    })
    .default(DEFAULTS.server),
  logging: z
    .object({
      level: z
        .enum(["fatal", "error", "warn", "info", "debug"])
        .default(DEFAULTS.logging.level),
      pretty: z.boolean().default(DEFAULTS.logging.pretty),
    })
    .default(DEFAULTS.logging),
  attestations: z
    .object({
      url: z.url().default(DEFAULTS.attestations.url),
      schemaId: bytes32Schema.default(DEFAULTS.attestations.schemaId),
      timeoutMs: z.number().int().positive().default(DEFAULTS.attestations.timeoutMs),
    })
    .default(DEFAULTS.attestations),
  credentials: z
    .object({
      enabled: z.boolean().default(DEFAULTS.credentials.enabled),
      url: z.url().default(DEFAULTS.credentials.url),
      timeoutMs: z.number().int().positive().default(DEFAULTS.credentials.timeoutMs),
    })
    .default(DEFAULTS.credentials),
  ledger: z
    .object({
      maxLabelBytes: z
        .number()
        .int()
        .positive()
        .max(65536)
        .default(DEFAULTS.ledger.maxLabelBytes),
      chainId: z.number().int().positive().default(DEFAULTS.ledger.chainId),
    })
    .default(DEFAULTS.ledger),
  roles: z
    .object({
      governors: addressListSchema,
      executors: addressListSchema,
      reservers: addressListSchema,
      administrators: addressListSchema,
    })
    .default(DEFAULTS.roles),
  resolvers: z
    .array(ResolverConfigSchema)
    .min(1)
    .refine(
      (resolvers) => new Set(resolvers.map((r) => r.id)).size === resolvers.length,
      "Resolver ids must be unique",
    )
    .default(DEFAULTS.resolvers),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = ServerConfig["logging"];
export type ResolverConfig = z.infer<typeof ResolverConfigSchema>;
