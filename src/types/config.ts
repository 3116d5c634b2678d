export interface Config {
  /** Module manifest path, relative to the project root. */
  manifest: string;
  contentDir: string;
  contentExtension: string;
  separator: string;
  composeTolerance: number;
  defaultBudget?: number;
  sessionsDir: string;
}
