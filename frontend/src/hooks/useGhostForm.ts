import { useState, useCallback, useEffect } from 'react';
import type { FieldDescriptor, FormSubmitResponse } from '@formveil/shared';
import { api } from '../services/api.js';
import { applySigilProof, buildSubmission } from '../services/honeypot.js';

export function useGhostForm(formId: string) {
  const [fields, setFields] = useState<FieldDescriptor[]>([]);
  const [loading, setLoading] = useState(true);
  const [error, setError] = useState<string | null>(null);

  const load = useCallback(async (): Promise<void> => {
    setLoading(true);
    setError(null);
    try {
      const res = await api.getForm(formId);
      setFields(res.fields);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to load form');
    } finally {
      setLoading(false);
    }
  }, [formId]);

  useEffect(() => {
    void load();
  }, [load]);

  const submit = useCallback(async (values: Record<string, string>): Promise<FormSubmitResponse> => {
    setLoading(true);
    setError(null);
    try {
      const signed = applySigilProof(fields, navigator.userAgent);
      return await api.submitForm(formId, buildSubmission(signed, values));
    } catch (err) {
      const msg = err instanceof Error ? err.message : 'Failed to submit form';
      setError(msg);
      throw err;
    } finally {
      setLoading(false);
    }
  }, [formId, fields]);

  return { fields, loading, error, reload: load, submit };
}
