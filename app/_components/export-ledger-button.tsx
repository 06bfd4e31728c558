"use client";

import { Download } from "lucide-react";
import { Button } from "@/components/ui/button";
import type { SimulationResult } from "@/lib/model/summary";
import { downloadLedgerCsv } from "@/lib/export/ledgerToCsv";

export function ExportLedgerButton({ result }: { result: SimulationResult }) {
  return (
    <Button
      onClick={() => downloadLedgerCsv(result)}
      title="Baixar resultados diários em CSV"
    >
      <Download className="size-4" aria-hidden />
      Exportar CSV
    </Button>
  );
}
