"use client";

import { useSimulationStore } from "@/stores/simulation";
import { ComparisonChart } from "@/components/charts/ComparisonChart";
import { SimulationSidebar } from "./_components/simulation-sidebar";
import { ValidationBanner } from "./_components/validation-banner";
import { SummaryCards } from "./_components/summary-cards";
import { DailyLedgerTable } from "./_components/daily-ledger-table";
import { ExportLedgerButton } from "./_components/export-ledger-button";

export default function SimulationPage() {
  const result = useSimulationStore((s) => s.result);

  return (
    <div className="flex min-h-screen bg-background">
      <SimulationSidebar />
      <main className="flex-1 space-y-6 overflow-auto p-6">
        <header>
          <h1 className="text-2xl font-semibold tracking-tight text-content">
            Calculadora de Rendimentos 99Pay
          </h1>
          <p className="text-sm text-content-muted">
            Simula os rendimentos compostos diários da carteira 99Pay e compara com a poupança.
          </p>
        </header>

        <ValidationBanner />

        {result ? (
          <>
            <SummaryCards result={result} />
            <ComparisonChart result={result} />
            <section className="space-y-3">
              <div className="flex items-center justify-between">
                <h2 className="text-xl font-semibold text-content">
                  Resultados Diários Detalhados
                </h2>
                <ExportLedgerButton result={result} />
              </div>
              <DailyLedgerTable result={result} />
            </section>
          </>
        ) : (
          <p className="rounded-md border border-blue-200 bg-blue-50 p-3 text-sm text-blue-800">
            Preencha os parâmetros na barra lateral e clique em &apos;Calcular Rendimento&apos;
            para ver os resultados.
          </p>
        )}
      </main>
    </div>
  );
}
