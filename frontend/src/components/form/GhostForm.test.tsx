import { fireEvent, render, screen } from '@testing-library/react';
import userEvent from '@testing-library/user-event';
import { describe, it, expect, vi } from 'vitest';
import type { FieldDescriptor } from '@formveil/shared';
import { GhostForm } from './GhostForm.js';

function field(overrides: Partial<FieldDescriptor> & Pick<FieldDescriptor, 'logicalName'>): FieldDescriptor {
  return {
    wireId: `ID${overrides.logicalName}`,
    inputType: 'text',
    placeholder: '',
    value: '',
    isLegitimate: true,
    isSigil: false,
    ...overrides,
  };
}

const fields: FieldDescriptor[] = [
  field({ logicalName: 'user_phone_number', inputType: 'tel', placeholder: 'User phone number', isLegitimate: false }),
  field({ logicalName: 'email', inputType: 'email', placeholder: 'Your email' }),
  field({ logicalName: 'message', inputType: 'textarea', placeholder: 'Message' }),
  field({ logicalName: 'sigil_time', inputType: 'hidden', value: 'T0KEN', isLegitimate: false, isSigil: true }),
  field({ logicalName: 'sigil', inputType: 'hidden', value: 'tck_placeholder00', isLegitimate: false, isSigil: true }),
];

describe('GhostForm', () => {
  it('names every input by its wire id', () => {
    const { container } = render(<GhostForm fields={fields} onSubmit={vi.fn()} loading={false} />);
    const names = Array.from(container.querySelectorAll('input, textarea')).map(el => el.getAttribute('name'));
    expect(names).toEqual(['IDuser_phone_number', 'IDemail', 'IDmessage', 'IDsigil_time', 'IDsigil']);
  });

  it('renders legitimate fields with their placeholder as label', () => {
    render(<GhostForm fields={fields} onSubmit={vi.fn()} loading={false} />);
    expect(screen.getByLabelText('Your email')).toHaveAttribute('type', 'email');
    expect(screen.getByLabelText('Message').tagName).toBe('TEXTAREA');
  });

  it('hides honeypots off screen and out of the tab order', () => {
    const { container } = render(<GhostForm fields={fields} onSubmit={vi.fn()} loading={false} />);
    const label = container.querySelector('label#IDuser_phone_number');
    expect(label).toHaveStyle({ position: 'absolute', left: '-9999px' });
    const input = container.querySelector('input[name="IDuser_phone_number"]');
    expect(input).toHaveAttribute('tabindex', '-1');
    expect(input).toHaveAttribute('autocomplete', 'off');
    expect(input).not.toBeRequired();
  });

  it('renders sigil fields as hidden inputs with their server values', () => {
    const { container } = render(<GhostForm fields={fields} onSubmit={vi.fn()} loading={false} />);
    expect(container.querySelector('input[name="IDsigil_time"]')).toHaveAttribute('type', 'hidden');
    expect(container.querySelector('input[name="IDsigil_time"]')).toHaveValue('T0KEN');
  });

  it('submits typed values keyed by logical name', async () => {
    const onSubmit = vi.fn().mockResolvedValue(undefined);
    render(<GhostForm fields={fields} onSubmit={onSubmit} loading={false} />);
    await userEvent.type(screen.getByLabelText('Your email'), 'ada@example.com');
    await userEvent.type(screen.getByLabelText('Message'), 'Hello');
    await userEvent.click(screen.getByText('Send'));
    expect(onSubmit).toHaveBeenCalledWith({ email: 'ada@example.com', message: 'Hello', user_phone_number: '' });
  });

  it('submits what was typed into a honeypot', async () => {
    const onSubmit = vi.fn().mockResolvedValue(undefined);
    render(<GhostForm fields={fields} onSubmit={onSubmit} loading={false} />);
    fireEvent.change(screen.getByTitle('User phone number'), { target: { value: '555-0100' } });
    await userEvent.click(screen.getByText('Send'));
    expect(onSubmit).toHaveBeenCalledWith({ user_phone_number: '555-0100' });
  });

  it('shows an error if onSubmit rejects', async () => {
    const onSubmit = vi.fn().mockRejectedValue(new Error('Forbidden'));
    render(<GhostForm fields={fields} onSubmit={onSubmit} loading={false} />);
    await userEvent.click(screen.getByText('Send'));
    expect(await screen.findByRole('alert')).toHaveTextContent('Forbidden');
  });

  it('disables the button while loading', () => {
    render(<GhostForm fields={fields} onSubmit={vi.fn()} loading={true} />);
    expect(screen.getByRole('button')).toBeDisabled();
  });
});
