import { z } from "zod";
import prettier from "@prettier/sync";

/**
 * Render a Zod object schema as the empty JSON object the LLM is asked to fill.
 * Used for the user instruction of the extraction prompt.
 */
export function zodToJsonTemplate(schema: z.ZodTypeAny): string {
  return prettier.format(JSON.stringify(templateValue(schema)), {
    parser: "json",
    printWidth: 100,
  });
}

type TemplateValue = string | { [key: string]: TemplateValue };

function templateValue(schema: z.ZodTypeAny): TemplateValue {
  const inner = unwrap(schema);

  if (inner instanceof z.ZodObject) {
    const shape: Record<string, z.ZodTypeAny> = inner.shape;
    const out: { [key: string]: TemplateValue } = {};
    for (const [key, value] of Object.entries(shape)) {
      out[key] = templateValue(value);
    }
    return out;
  }

  // Every leaf of the form is a string; the model is told to use "" for absent values
  return "";
}

function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  let inner = schema;
  while (
    inner instanceof z.ZodOptional ||
    inner instanceof z.ZodNullable ||
    inner instanceof z.ZodDefault
  ) {
    inner =
      inner instanceof z.ZodDefault ? inner.removeDefault() : inner.unwrap();
  }
  return inner;
}
