import { useState } from 'react';
import { Card, ErrorMessage } from '../layout/Layout.js';
import { GhostForm } from './GhostForm.js';
import { useGhostForm } from '../../hooks/useGhostForm.js';

export function ContactPage() {
  const { fields, loading, error, submit } = useGhostForm('contact');
  const [sent, setSent] = useState(false);

  const handleSubmit = async (values: Record<string, string>) => {
    await submit(values);
    setSent(true);
  };

  return (
    <Card>
      <h1 className="text-xl font-bold mb-4">Contact us</h1>
      {sent ? (
        <p role="status">Thanks, your message has been sent.</p>
      ) : fields.length > 0 ? (
        <GhostForm fields={fields} onSubmit={handleSubmit} loading={loading} />
      ) : (
        <ErrorMessage message={error} />
      )}
    </Card>
  );
}
