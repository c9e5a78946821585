import path from "node:path";

// Output tree layout. Every writer gets its own (zone) or (language, zone) subtree.

export type OutputLayout = {
  root: string;
  schemasDir: string;
  clientsDir: string;
  archiveDir: string;
  workDir: string;
  logsDir: string;
};

export function createOutputLayout(root: string): OutputLayout {
  const abs = path.resolve(root);
  return {
    root: abs,
    schemasDir: path.join(abs, "schemas"),
    clientsDir: path.join(abs, "clients"),
    archiveDir: path.join(abs, "archive"),
    workDir: path.join(abs, ".work"),
    logsDir: path.join(abs, "logs"),
  };
}

export function schemaPath(layout: OutputLayout, zone: string, ext: string): string {
  return path.join(layout.schemasDir, `${zone}.${ext}`);
}

export function zoneWorkDir(layout: OutputLayout, zone: string): string {
  return path.join(layout.workDir, zone);
}

export function clientOutputDir(layout: OutputLayout, language: string, zone: string): string {
  return path.join(layout.clientsDir, language, zone);
}

export function languageClientsDir(layout: OutputLayout, language: string): string {
  return path.join(layout.clientsDir, language);
}

export function runLogPath(layout: OutputLayout, runId: string): string {
  return path.join(layout.logsDir, `${runId}.jsonl`);
}
