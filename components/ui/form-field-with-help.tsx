"use client";

import { HelpTooltip } from "./help-tooltip";
import { formatHelpContent, type HelpEntry } from "@/lib/copy/help";

interface FormFieldWithHelpProps {
  id: string;
  help: HelpEntry;
  children: React.ReactNode;
}

export function FormFieldWithHelp({ id, help, children }: FormFieldWithHelpProps) {
  return (
    <div className="space-y-1">
      <div className="mb-1 flex items-center gap-1.5">
        <label htmlFor={id} className="block text-sm font-medium text-content-muted">
          {help.title}
        </label>
        <HelpTooltip content={formatHelpContent(help)} />
      </div>
      {children}
    </div>
  );
}
