/**
 * Zustand store for the sidebar form and the last computed simulation.
 * Form transitions are the pure functions in lib/model/form; the store only holds state.
 */

import { create } from "zustand";
import type { SimulationForm } from "@/lib/types/zod";
import { getDefaultAnnualRatePercent } from "@/lib/config";
import {
  clearForm,
  createDefaultForm,
  resetRate,
  submitForm,
  updateForm,
} from "@/lib/model/form";
import { runSimulation, type SimulationResult } from "@/lib/model/summary";
import { isInvalidInputError } from "@/lib/model/errors";
import type { ValidationResult } from "@/lib/model/validation";

export interface SimulationState {
  form: SimulationForm;
  defaultRatePercent: number;
  result: SimulationResult | null;
  /** Outcome of the last "Calcular" click; null before the first one. */
  validation: ValidationResult | null;
}

export interface SimulationActions {
  setField: (patch: Partial<SimulationForm>) => void;
  resetRate: () => void;
  clearSimulation: () => void;
  calculate: () => void;
}

export type SimulationStore = SimulationState & SimulationActions;

function createInitialState(): SimulationState {
  const defaultRatePercent = getDefaultAnnualRatePercent();
  return {
    form: createDefaultForm(defaultRatePercent),
    defaultRatePercent,
    result: null,
    validation: null,
  };
}

export const useSimulationStore = create<SimulationStore>()((set, get) => ({
  ...createInitialState(),

  setField: (patch) => {
    set((state) => ({ form: updateForm(state.form, patch) }));
  },

  resetRate: () => {
    set((state) => ({
      form: resetRate(state.form, state.defaultRatePercent),
    }));
  },

  clearSimulation: () => {
    set((state) => ({
      form: clearForm(state.form),
      result: null,
      validation: null,
    }));
  },

  calculate: () => {
    const submission = submitForm(get().form);
    if (!submission.ok) {
      set({ result: null, validation: submission.validation });
      return;
    }

    try {
      const result = runSimulation(submission.input);
      set({ result, validation: submission.validation });
    } catch (err) {
      if (!isInvalidInputError(err)) throw err;
      console.error("[Simulation] Rejected input:", err.message);
      set({
        result: null,
        validation: {
          errors: err.issues,
          warnings: submission.validation.warnings,
        },
      });
    }
  },
}));

/** Restore the initial state (tests and hot reload). */
export function resetSimulationStore(): void {
  useSimulationStore.setState(createInitialState());
}
