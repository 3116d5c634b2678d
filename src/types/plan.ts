import type { Module } from './module.js';

export interface SelectionCriteria {
  explicitIds?: Iterable<string>;
  goalTags?: Iterable<string>;
  tokenBudget?: number;
  maxModules?: number;
}

export interface ExecutionPlan {
  orderedModules: Module[];
  totalTokens: number;
  droppedModules: Module[];
  warnings: string[];
}

export interface PlanFile {
  orderedModules: string[];
  totalTokens: number;
  droppedModules: string[];
  warnings: string[];
}

export interface ComposedModule {
  id: string;
  tokenEstimate: number;
  measuredTokens: number;
}

export interface ComposeManifest {
  modules: ComposedModule[];
  declaredTokens: number;
  measuredTokens: number;
  warnings: string[];
}

export interface ComposeResult {
  artifact: string;
  manifest: ComposeManifest;
}
