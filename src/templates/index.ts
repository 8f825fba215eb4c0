/**
 * Template module: versioned expectation sets per candidate and modality.
 */

export {
  SourceIdSchema,
  ExpectedLineSchema,
  SparseTemplateSchema,
  DenseTemplateSchema,
  TemplateSchema,
  type ExpectedLine,
  type SparseTemplate,
  type DenseTemplate,
  type Template,
  type TemplateInput,
} from "./schema.js";

export { TemplateRegistry, type TemplateRegistryOptions } from "./registry.js";
