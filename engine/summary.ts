import type { Counts, ConformanceRecord } from "./record.ts";

const STATUS_ORDER = [
  "conformant",
  "agreement",
  "pass",
  "fail",
  "disagreement",
  "skipped",
  "error",
] as const;

const COLUMNS: ReadonlyArray<[string, keyof Counts]> = [
  ["pass", "passed"],
  ["fail", "failed"],
  ["error", "errored"],
  ["skip", "skipped"],
  ["unavailable", "unavailable"],
  ["undecided", "undecided"],
];

function table(record: ConformanceRecord): string[] {
  let rows = Object.entries(record.aggregates.byImplementation);
  let width = Math.max("implementation".length, ...rows.map(([name]) => name.length));
  let header = ["implementation".padEnd(width), ...COLUMNS.map(([title]) => title)];
  return [
    header.join("  "),
    ...rows.map(([name, counts]) =>
      [
        name.padEnd(width),
        ...COLUMNS.map(([title, key]) => String(counts[key]).padStart(title.length)),
      ].join("  ")
    ),
  ];
}

/**
 * Human readable digest of a run, for the terminal.
 */
export function formatSummary(record: ConformanceRecord): string {
  let { tests, aggregates } = record;
  let statuses = STATUS_ORDER
    .filter((status) => (aggregates.byStatus[status] ?? 0) > 0)
    .map((status) => `${status} ${aggregates.byStatus[status]}`);

  let lines = [
    `${tests.length} case(s) in ${record.run.durationMs}ms`,
    `statuses: ${statuses.length > 0 ? statuses.join(", ") : "none"}`,
    "",
    ...table(record),
  ];

  let problems = tests.filter(({ outcome }) =>
    outcome.status === "fail" || outcome.status === "disagreement" ||
    outcome.status === "error"
  );
  if (problems.length > 0) {
    lines.push("", "problems:");
    for (let test of problems) {
      lines.push(`  ${test.id} ${test.variant}: ${test.outcome.status}`);
      for (let result of test.results) {
        if (result.error && (result.status === "fail" || result.status === "error")) {
          let { kind, subtype, message } = result.error;
          lines.push(`    ${result.implementation}: ${kind}/${subtype}: ${message}`);
        }
      }
    }
  }
  return lines.join("\n");
}
