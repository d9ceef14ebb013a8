/**
 * Documentation Model Schema
 *
 * Validates documentation models read from JSON files.
 */

import fs from "node:fs/promises";
import { z } from "zod";
import type { DocumentationModel, TopicModel } from "@apisite/site-schema";
import { formatIssue } from "@apisite/theme-engine";
import { ModelValidationError } from "./errors.js";

// names become sitemap titles, which may not be blank
const nameSchema = z.string().refine((name) => name.trim().length > 0, "Must not be blank");

const memberSchema = z.object({
  kind: z.enum(["constructor", "field", "property", "method", "event", "operator"]),
  name: nameSchema,
  url: z.string(),
  isExplicitInterfaceImplementation: z.boolean().optional(),
});

const typeSchema = z.object({
  kind: z.enum(["class", "struct", "interface", "enum", "delegate"]),
  name: nameSchema,
  url: z.string(),
  members: z.array(memberSchema).default([]),
});

const namespaceSchema = z.object({
  name: nameSchema,
  url: z.string(),
  types: z.array(typeSchema).default([]),
});

const assemblySchema = z.object({
  name: nameSchema,
  namespaces: z.array(namespaceSchema).default([]),
});

const topicSchema: z.ZodType<TopicModel, z.ZodTypeDef, unknown> = z.lazy(() =>
  z.object({
    name: nameSchema,
    url: z.string(),
    subtopics: z.array(topicSchema).default([]),
  }),
);

export const documentationModelSchema = z.object({
  assemblies: z.array(assemblySchema).default([]),
  topics: z.array(topicSchema).default([]),
}) satisfies z.ZodType<DocumentationModel, z.ZodTypeDef, unknown>;

/**
 * Validate a documentation model.
 *
 * @param data - Parsed JSON
 * @param source - File the data came from, used in the error message
 * @throws {ModelValidationError} Listing every violation found
 */
export function parseDocumentationModel(data: unknown, source: string): DocumentationModel {
  const result = documentationModelSchema.safeParse(data);
  if (!result.success) {
    throw new ModelValidationError(
      `Documentation model contains errors: ${source}`,
      result.error.issues.map(formatIssue),
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * Read and validate a documentation model file.
 */
export async function readDocumentationModel(filePath: string): Promise<DocumentationModel> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    throw new ModelValidationError(`Documentation model could not be read: ${filePath}`, [], {
      cause: error,
    });
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ModelValidationError(`Documentation model could not be parsed: ${filePath}`, [message], {
      cause: error,
    });
  }

  return parseDocumentationModel(data, filePath);
}
