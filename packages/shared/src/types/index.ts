/**
 * @fileoverview Type exports for the shared package
 *
 * ```typescript
 * import type { BootstrapPayload, Todo } from "@study-archive/shared";
 * ```
 */

export * from "./bootstrap.js";
