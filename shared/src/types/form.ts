import type { FieldDescriptor } from './field.js';

export interface FormDefinitionResponse {
  formId: string;
  fields: FieldDescriptor[];
}

export interface FormSubmitResponse {
  formId: string;
  data: Record<string, string>;
}
