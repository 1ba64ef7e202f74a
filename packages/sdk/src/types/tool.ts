/**
 * Tool descriptions offered to a model.
 */

import type { z } from "zod";

/** JSON Schema representation of a tool for provider APIs. */
export interface ToolJsonSchema {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

/**
 * A tool the model is forced to call in `useAnyTool`.
 * `parameters` may be given as a zod schema and is converted to JSON Schema.
 */
export interface ForcedToolSpec {
  name: string;
  description: string;
  parameters: Record<string, unknown> | z.ZodType;
}
