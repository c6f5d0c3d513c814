import React from 'react';
import { EnvironmentBanner } from './EnvironmentBanner.js';

interface LayoutProps {
  children: React.ReactNode;
}

export function Layout({ children }: LayoutProps) {
  return (
    <div className="min-h-screen flex flex-col bg-base-200 text-base-content">
      <EnvironmentBanner />
      <main className="flex-1 flex flex-col items-center justify-center p-4">
        {children}
      </main>
    </div>
  );
}

interface CardProps {
  children: React.ReactNode;
  className?: string;
}

export function Card({ children, className = '' }: CardProps) {
  return (
    <div className={`bg-base-100 rounded-xl shadow-md p-6 w-full max-w-md ${className}`}>
      {children}
    </div>
  );
}

interface ErrorMessageProps {
  message: string | null;
}

export function ErrorMessage({ message }: ErrorMessageProps) {
  if (!message) return null;
  return (
    <div role="alert" className="alert alert-error text-sm py-2">
      {message}
    </div>
  );
}

interface ButtonProps extends React.ButtonHTMLAttributes<HTMLButtonElement> {
  loading?: boolean;
}

export function Button({ children, loading = false, disabled, className = '', ...props }: ButtonProps) {
  return (
    <button
      className={`btn btn-primary ${className}`}
      disabled={disabled || loading}
      {...props}
    >
      {loading ? (
        <>
          <span className="loading loading-spinner loading-sm" />
          Please wait…
        </>
      ) : children}
    </button>
  );
}

interface InputProps extends React.InputHTMLAttributes<HTMLInputElement> {
  label: string;
}

export function Input({ label, id, className = '', ...props }: InputProps) {
  return (
    <div className="flex flex-col gap-1">
      <label htmlFor={id} className="text-sm font-medium text-base-content/70">
        {label}
      </label>
      <input
        id={id}
        className={`input input-bordered w-full ${className}`}
        {...props}
      />
    </div>
  );
}

interface TextAreaProps extends React.TextareaHTMLAttributes<HTMLTextAreaElement> {
  label: string;
}

export function TextArea({ label, id, className = '', rows = 4, ...props }: TextAreaProps) {
  return (
    <div className="flex flex-col gap-1">
      <label htmlFor={id} className="text-sm font-medium text-base-content/70">
        {label}
      </label>
      <textarea
        id={id}
        rows={rows}
        className={`textarea textarea-bordered w-full ${className}`}
        {...props}
      />
    </div>
  );
}
