import { z } from "@file-serve/utils";

/**
 * File server configuration schema
 */
export const fileServerConfigSchema = z.object({
  port: z
    .number()
    .int()
    .min(0)
    .max(65535)
    .describe("TCP port to listen on (0 picks a free port)")
    .default(8000),
  hostname: z
    .string()
    .min(1)
    .describe("Address to bind; 0.0.0.0 listens on all interfaces")
    .default("0.0.0.0"),
  rootDir: z
    .string()
    .optional()
    .describe("Directory to serve, defaults to the working directory"),
  directoryListing: z
    .boolean()
    .describe("Render a listing for directories without index.html")
    .default(true),
  startupMessage: z
    .string()
    .describe("Line printed to stdout once the socket is bound")
    .default("good morning"),
});

export type FileServerConfig = z.infer<typeof fileServerConfigSchema>;
export type FileServerConfigInput = z.input<typeof fileServerConfigSchema>;

export const defaultFileServerConfig: FileServerConfig =
  fileServerConfigSchema.parse({});
