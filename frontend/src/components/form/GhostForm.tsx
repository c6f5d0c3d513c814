import { useState, type FormEvent } from 'react';
import type { FieldDescriptor } from '@formveil/shared';
import { Button, Input, TextArea, ErrorMessage } from '../layout/Layout.js';
import { HIDDEN_FIELD_STYLE, isTrap, readTrapValues } from '../../services/honeypot.js';

interface GhostFormProps {
  fields: FieldDescriptor[];
  onSubmit: (values: Record<string, string>) => Promise<void>;
  loading: boolean;
  submitLabel?: string;
}

function TrapField({ field }: { field: FieldDescriptor }) {
  if (field.inputType === 'hidden') {
    return <input type="hidden" name={field.wireId} defaultValue={field.value} />;
  }
  // Labelled with the logical name: that is what a scraper matches on
  return (
    <label id={field.wireId} style={HIDDEN_FIELD_STYLE} aria-hidden="true">
      {field.logicalName}
      <input
        type={field.inputType}
        name={field.wireId}
        title={field.placeholder}
        placeholder={field.placeholder}
        defaultValue={field.value}
        autoComplete="off"
        tabIndex={-1}
      />
    </label>
  );
}

export function GhostForm({ fields, onSubmit, loading, submitLabel = 'Send' }: GhostFormProps) {
  const [values, setValues] = useState<Record<string, string>>({});
  const [error, setError] = useState<string | null>(null);

  const setValue = (name: string, value: string) => {
    setValues(prev => ({ ...prev, [name]: value }));
  };

  const handleSubmit = async (e: FormEvent<HTMLFormElement>) => {
    e.preventDefault();
    setError(null);
    // Decoys are uncontrolled; whatever a script typed into them goes along
    const traps = readTrapValues(fields, new FormData(e.currentTarget));
    try {
      await onSubmit({ ...values, ...traps });
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Submission failed');
    }
  };

  return (
    <form onSubmit={handleSubmit} className="relative flex flex-col gap-3">
      {fields.map(field => {
        if (isTrap(field)) return <TrapField key={field.wireId} field={field} />;

        const label = field.placeholder || field.logicalName;
        const value = values[field.logicalName] ?? '';
        if (field.inputType === 'textarea') {
          return (
            <TextArea
              key={field.wireId}
              label={label}
              id={field.wireId}
              name={field.wireId}
              value={value}
              onChange={e => setValue(field.logicalName, e.target.value)}
            />
          );
        }
        return (
          <Input
            key={field.wireId}
            label={label}
            id={field.wireId}
            name={field.wireId}
            type={field.inputType}
            value={value}
            onChange={e => setValue(field.logicalName, e.target.value)}
          />
        );
      })}
      <ErrorMessage message={error} />
      <Button type="submit" loading={loading}>
        {submitLabel}
      </Button>
    </form>
  );
}
