"use client";

import { AlertTriangle, X } from "lucide-react";

interface FormErrorProps {
  message: string;
  onDismiss: () => void;
}

export function FormError({ message, onDismiss }: FormErrorProps) {
  return (
    <div role="alert" className="mb-4">
      <div className="flex items-start gap-3 rounded-xl border border-red-200 bg-red-50 p-4">
        <AlertTriangle className="mt-0.5 h-4 w-4 shrink-0 text-red-500" />
        <p className="flex-1 text-sm text-slate-700">{message}</p>

        <button
          type="button"
          onClick={onDismiss}
          className="shrink-0 rounded-md p-1 text-slate-400 transition-colors hover:bg-white/50 hover:text-slate-600"
          aria-label="Dismiss error"
        >
          <X className="h-4 w-4" />
        </button>
      </div>
    </div>
  );
}
