/**
 * Centralized Zod exports so every package validates with the same instance.
 *
 * Do not use wildcard exports here; they make TypeScript load all of Zod's
 * types.
 */
export { z } from "zod";

export type { ZodIssue } from "zod";
