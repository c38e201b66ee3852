export type ReportLine = {
  kind: "HEADER" | "ITEM" | "TOTAL" | "NOTE";
  text: string;
};

export function money(n: number): string {
  return `$${n.toFixed(2)}`;
}

export function qty(n: number): string {
  return Number.isInteger(n) ? String(n) : String(Number(n.toFixed(4)));
}

export function linesToText(lines: ReportLine[]): string {
  return lines
    .map((l) => {
      if (l.kind === "HEADER") return `\n${l.text}\n${"=".repeat(l.text.length)}`;
      if (l.kind === "ITEM") return `  - ${l.text}`;
      return l.text;
    })
    .join("\n");
}
