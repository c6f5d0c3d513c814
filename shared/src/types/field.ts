/**
 * One logical form input as exposed to a renderer. `wireId` is the only name
 * that ever appears in markup or in a submission.
 */
export interface FieldDescriptor {
  wireId: string;
  logicalName: string;
  inputType: string;
  placeholder: string;
  value: string;
  isLegitimate: boolean;
  isSigil: boolean;
}

// [isLegit, name, type?, placeholder?]
export type FlaggedFieldDefinition = readonly [boolean, string, string?, string?];

// [name, type?, placeholder?], always legitimate
export type LegitFieldDefinition = readonly [string, string?, string?];

export type FieldDefinition = string | FlaggedFieldDefinition | LegitFieldDefinition;

// Submitted form data keyed by wire id
export type FormSubmission = Readonly<Record<string, string | undefined>>;
