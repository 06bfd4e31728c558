"use client";

import { useSimulationStore } from "@/stores/simulation";
import { Button } from "@/components/ui/button";
import { FormFieldWithHelp } from "@/components/ui/form-field-with-help";
import { MoneyInput, NumberInput } from "@/components/ui/money-input";
import { HELP_FORM } from "@/lib/copy/help";

export function SimulationSidebar() {
  const form = useSimulationStore((s) => s.form);
  const defaultRatePercent = useSimulationStore((s) => s.defaultRatePercent);
  const setField = useSimulationStore((s) => s.setField);
  const resetRate = useSimulationStore((s) => s.resetRate);
  const clearSimulation = useSimulationStore((s) => s.clearSimulation);
  const calculate = useSimulationStore((s) => s.calculate);

  return (
    <aside className="flex w-80 flex-shrink-0 flex-col gap-4 border-r border-border bg-surface-elevated p-4">
      <h2 className="text-base font-semibold tracking-tight text-content">
        Parâmetros da Simulação
      </h2>

      <form
        className="flex flex-col gap-4"
        onSubmit={(e) => {
          e.preventDefault();
          calculate();
        }}
      >
        <FormFieldWithHelp id="principal" help={HELP_FORM.principal}>
          <MoneyInput
            id="principal"
            value={form.principal}
            onValueChange={(principal) => setField({ principal })}
          />
        </FormFieldWithHelp>

        <FormFieldWithHelp id="bonusPercent" help={HELP_FORM.bonusPercent}>
          <NumberInput
            id="bonusPercent"
            suffix="%"
            value={form.bonusPercent}
            onValueChange={(bonusPercent) => setField({ bonusPercent: bonusPercent ?? 0 })}
          />
        </FormFieldWithHelp>

        <FormFieldWithHelp id="days" help={HELP_FORM.days}>
          <NumberInput
            id="days"
            inputMode="numeric"
            suffix="dias"
            placeholder="Ex: 365"
            value={form.days}
            onValueChange={(days) => setField({ days })}
          />
        </FormFieldWithHelp>

        <FormFieldWithHelp id="annualRatePercent" help={HELP_FORM.annualRatePercent}>
          <NumberInput
            id="annualRatePercent"
            suffix="%"
            value={form.annualRatePercent}
            onValueChange={(annualRatePercent) => setField({ annualRatePercent })}
          />
        </FormFieldWithHelp>

        <Button className="w-full" onClick={resetRate}>
          Redefinir CDI para {defaultRatePercent}%
        </Button>

        <hr className="border-border" />

        <div className="grid grid-cols-2 gap-2">
          <Button type="submit" variant="primary">
            Calcular Rendimento
          </Button>
          <Button onClick={clearSimulation}>Limpar Simulação</Button>
        </div>
      </form>
    </aside>
  );
}
