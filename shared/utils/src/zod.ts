/**
 * Centralized Zod exports, so every config schema shares one Zod version.
 */

export { z, ZodError } from "zod";
