"use client";

import * as React from "react";
import { cn } from "@/lib/utils";
import { parseNumberInput } from "@/lib/utils/format";

interface NumberInputProps
  extends Omit<React.ComponentProps<"input">, "type" | "value" | "onChange"> {
  value: number | null;
  onValueChange: (value: number | null) => void;
  /** Addon shown before the field, e.g. "R$". */
  prefix?: string;
  /** Addon shown after the field, e.g. "%" or "dias". */
  suffix?: string;
}

/**
 * Numeric input that keeps the raw text while typing and reports the parsed value
 * (null when empty).
 */
function NumberInput({
  value,
  onValueChange,
  prefix,
  suffix,
  className,
  ...props
}: NumberInputProps) {
  const [text, setText] = React.useState(value === null ? "" : String(value));

  // Resync when the store changes the value (reset / clear buttons)
  React.useEffect(() => {
    setText((current) =>
      Object.is(parseNumberInput(current), value) ? current : value === null ? "" : String(value)
    );
  }, [value]);

  return (
    <div
      className={cn(
        "flex items-center rounded-md border border-border bg-surface focus-within:ring-2 focus-within:ring-border",
        className
      )}
    >
      {prefix && <span className="pl-3 text-sm text-content-muted">{prefix}</span>}
      <input
        type="text"
        inputMode="decimal"
        autoComplete="off"
        className="w-full min-w-0 bg-transparent px-3 py-2 text-sm tabular-nums text-content outline-none"
        value={text}
        onChange={(e) => {
          setText(e.target.value);
          onValueChange(parseNumberInput(e.target.value));
        }}
        {...props}
      />
      {suffix && <span className="pr-3 text-sm text-content-muted">{suffix}</span>}
    </div>
  );
}

function MoneyInput(props: Omit<NumberInputProps, "prefix" | "suffix">) {
  return <NumberInput prefix="R$" placeholder="Ex: 5000,00" {...props} />;
}

export { NumberInput, MoneyInput };
