import { describe, it, expect } from "vitest";
import { buildLedgerHeaders, ledgerToCsv } from "./ledgerToCsv";
import { runSimulation } from "@/lib/model/summary";

describe("buildLedgerHeaders", () => {
  it("labels tier 1 with its percent of CDI", () => {
    expect(buildLedgerHeaders(0)[2]).toBe("Rendimento Faixa 1 (110%)");
    expect(buildLedgerHeaders(10)[2]).toBe("Rendimento Faixa 1 (120%)");
  });
});

describe("ledgerToCsv", () => {
  it("writes one row per day and a summary block", () => {
    const result = runSimulation({ principal: 1000, days: 3, annualRatePercent: 11.15 });

    expect(ledgerToCsv(result)).toBe(
      [
        "Dia,Valor Inicial,Rendimento Faixa 1 (110%),Rendimento Faixa 2 (80%),Rendimento Total Dia,Valor Final",
        "1,1000.00,0.32,0.00,0.32,1000.32",
        "2,1000.32,0.32,0.00,0.32,1000.64",
        "3,1000.64,0.32,0.00,0.32,1000.96",
        "--- Resumo ---",
        "Valor Investido,1000.00",
        "CDI Anual (%),11.15",
        "99Pay - Valor Final,1000.96",
        "99Pay - Rendimento,0.96",
        "99Pay - Rendimento (%),0.10",
        "Poupança - Valor Final,1000.00",
        "Poupança - Rendimento,0.00",
        "Poupança - Rendimento (%),N/A",
        "",
      ].join("\n")
    );
  });

  it("adds the no-bonus summary when a bonus is set", () => {
    const result = runSimulation({
      principal: 1000,
      days: 30,
      annualRatePercent: 11.15,
      bonusPercent: 10,
    });
    const lines = ledgerToCsv(result).split("\n");

    expect(lines[0]).toContain("Rendimento Faixa 1 (120%)");
    expect(lines).toHaveLength(1 + 30 + 3 + 9 + 1);
    expect(lines.filter((l) => l.startsWith("99Pay sem bônus - "))).toHaveLength(3);
    expect(lines).toContain("Poupança - Rendimento (%),0.50");
  });
});
