import {
  FIELD,
  SIGIL,
  DEFAULT_HONEYPOT_FIELDS,
  type FieldDefinition,
  type FieldDescriptor,
  type FlaggedFieldDefinition,
} from '@formveil/shared';
import { candidateBuckets, deriveWireId, formatTimeBucket, type CandidateBuckets } from '../utils/obfuscation.js';
import {
  createPlaceholderToken,
  createTimeToken,
  sigilFieldNames,
  type SigilFieldNames,
} from './sigil.js';

export type Field = Readonly<FieldDescriptor>;

export interface FieldRegistryOptions {
  secretKey: string;
  /** Fixed clock for this instance; defaults to the wall clock at construction. */
  now?: Date;
  timeZone?: string;
}

interface FieldDraft {
  isLegitimate: boolean;
  logicalName: string;
  inputType?: string;
  placeholder?: string;
  value?: string;
  isSigil?: boolean;
}

export function isValidFieldName(name: string): boolean {
  return FIELD.NAME_PATTERN.test(name);
}

function hasLegitFlag(definition: Exclude<FieldDefinition, string>): definition is FlaggedFieldDefinition {
  return typeof definition[0] === 'boolean';
}

// Holds every field of one form for one request. All wire ids are derived
// from the `now` captured at construction; never share an instance across
// requests, it would hand one visitor's wire names to another.
export class FieldRegistry {
  readonly now: Date;
  readonly timeZone: string;
  readonly bucket: string;
  private readonly secretKey: string;
  private readonly fields = new Map<string, Field>();
  private readonly byWireId = new Map<string, Field>();
  private sigil: SigilFieldNames | null = null;

  constructor({ secretKey, now = new Date(), timeZone = 'UTC' }: FieldRegistryOptions) {
    this.secretKey = secretKey;
    this.now = new Date(now.getTime());
    this.timeZone = timeZone;
    this.bucket = formatTimeBucket(this.now, timeZone);
  }

  /**
   * Creates and stores a field. Returns null (and stores nothing) when the
   * name is not made of letters, digits, `_` and `-`. A second field with the
   * same name replaces the first in place.
   */
  createField(isLegit: boolean, logicalName: string, type = '', placeholder = ''): Field | null {
    return this.insert({ isLegitimate: isLegit, logicalName, inputType: type, placeholder });
  }

  /** Bulk variant of {@link createField}; invalid names are skipped. */
  createFields(definitions: readonly FieldDefinition[] = DEFAULT_HONEYPOT_FIELDS): this {
    for (const definition of definitions) {
      if (typeof definition === 'string') {
        this.createField(true, definition);
      } else if (hasLegitFlag(definition)) {
        const [legit, name, type, placeholder] = definition;
        this.createField(legit, name, type, placeholder);
      } else {
        const [name, type, placeholder] = definition;
        this.createField(true, name, type, placeholder);
      }
    }
    return this;
  }

  addLegit(name: string, type = '', placeholder = ''): this {
    this.createField(true, name, type, placeholder);
    return this;
  }

  addHoneypot(name: string, type = '', placeholder = ''): this {
    this.createField(false, name, type, placeholder);
    return this;
  }

  /**
   * Adds the two hidden handshake fields. Only the first call has any effect;
   * a name that fails the field pattern leaves the handshake disabled.
   */
  enableSigil(name: string = SIGIL.DEFAULT_NAME): this {
    if (this.sigil || !isValidFieldName(name)) return this;

    const names = sigilFieldNames(name);
    this.insert({
      isLegitimate: false,
      logicalName: names.time,
      inputType: FIELD.HIDDEN_INPUT_TYPE,
      value: createTimeToken(this.now),
      isSigil: true,
    });
    this.insert({
      isLegitimate: false,
      logicalName: names.proof,
      inputType: FIELD.HIDDEN_INPUT_TYPE,
      value: createPlaceholderToken(),
      isSigil: true,
    });
    this.sigil = names;
    return this;
  }

  get sigilNames(): SigilFieldNames | null {
    return this.sigil;
  }

  getField(name: string): Field | undefined {
    return this.fields.get(name);
  }

  /** Looks up a field by its wire id in the current bucket only. */
  getFieldByWireId(wireId: string): Field | undefined {
    return this.byWireId.get(wireId);
  }

  /** Current-bucket wire id, or '' for an unknown field. */
  getId(name: string): string {
    return this.fields.get(name)?.wireId ?? '';
  }

  getFields(): Field[] {
    return [...this.fields.values()];
  }

  candidateBuckets(): CandidateBuckets {
    return candidateBuckets(this.now, this.timeZone);
  }

  wireIdFor(logicalName: string, bucket: string): string {
    if (bucket === this.bucket) {
      const field = this.fields.get(logicalName);
      if (field) return field.wireId;
    }
    return deriveWireId(logicalName, this.secretKey, bucket);
  }

  describe(): FieldDescriptor[] {
    return this.getFields().map(field => ({ ...field }));
  }

  private insert(draft: FieldDraft): Field | null {
    if (!isValidFieldName(draft.logicalName)) return null;

    const field: Field = Object.freeze({
      wireId: deriveWireId(draft.logicalName, this.secretKey, this.bucket),
      logicalName: draft.logicalName,
      inputType: draft.inputType || FIELD.DEFAULT_INPUT_TYPE,
      placeholder: draft.placeholder ?? '',
      value: draft.value ?? '',
      isLegitimate: draft.isLegitimate,
      isSigil: draft.isSigil ?? false,
    });

    const previous = this.fields.get(field.logicalName);
    if (previous) this.byWireId.delete(previous.wireId);
    this.fields.set(field.logicalName, field);
    this.byWireId.set(field.wireId, field);
    return field;
  }
}
