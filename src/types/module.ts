export type ModuleCategory = 'core' | 'specialized' | 'tech_stack' | 'checklist';

export const MODULE_CATEGORIES: readonly ModuleCategory[] = [
  'core',
  'specialized',
  'tech_stack',
  'checklist',
];

/** Lower number sorts first and is dropped last. */
export const CATEGORY_PRIORITY: Record<ModuleCategory, number> = {
  core: 0,
  specialized: 1,
  tech_stack: 2,
  checklist: 3,
};

export interface ModuleDefinition {
  id: string;
  title?: string;
  category: ModuleCategory;
  tokenEstimate: number;
  dependencies?: string[];
  tags?: string[];
  checklistItems?: number;
}

export interface Module {
  readonly id: string;
  readonly title: string;
  readonly category: ModuleCategory;
  readonly tokenEstimate: number;
  readonly dependencies: readonly string[];
  readonly tags: readonly string[];
  /** Number of checklist items, used for checklist percentage scoring. */
  readonly checklistItems?: number;
}

export interface ModuleManifest {
  modules: ModuleDefinition[];
  goals?: Record<string, string[]>;
}
