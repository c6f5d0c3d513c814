import type { FieldDefinition } from '@formveil/shared';
import { FieldRegistry } from './field-registry.js';

export interface FormBlueprint {
  id: string;
  fields: readonly FieldDefinition[];
  required: readonly string[];
}

export interface BuildFormOptions {
  secretKey: string;
  now: Date;
  timeZone: string;
  seedHoneypots: boolean;
  /** Sigil field name, or null to leave the handshake off. */
  sigilName: string | null;
}

export const FORMS: Readonly<Record<string, FormBlueprint>> = {
  contact: {
    id: 'contact',
    fields: [
      ['name', 'text', 'Your name'],
      ['email', 'email', 'Your email address'],
      ['message', 'textarea', 'How can we help?'],
    ],
    required: ['email', 'message'],
  },
  newsletter: {
    id: 'newsletter',
    fields: [['email', 'email', 'Your email address']],
    required: ['email'],
  },
};

export function getBlueprint(formId: string): FormBlueprint | null {
  return Object.hasOwn(FORMS, formId) ? FORMS[formId] : null;
}

// Rendering and validating the same form must go through this function with
// the same options, or the wire ids will not line up.
export function buildForm(blueprint: FormBlueprint, options: BuildFormOptions): FieldRegistry {
  const registry = new FieldRegistry({
    secretKey: options.secretKey,
    now: options.now,
    timeZone: options.timeZone,
  });
  if (options.seedHoneypots) {
    registry.createFields();
  }
  registry.createFields(blueprint.fields);
  if (options.sigilName !== null) {
    registry.enableSigil(options.sigilName);
  }
  return registry;
}

export function missingRequired(blueprint: FormBlueprint, data: Record<string, string>): string[] {
  return blueprint.required.filter(name => !data[name]?.trim());
}
