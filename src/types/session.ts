export type Severity = 'P0' | 'P1' | 'P2' | 'P3';

export const SEVERITIES: readonly Severity[] = ['P0', 'P1', 'P2', 'P3'];

export type SessionStatus = 'Created' | 'InProgress' | 'Finalized';

export type RiskLevel = 'Critical' | 'High' | 'Medium' | 'Low';

export interface FindingLocation {
  file: string;
  line?: number;
}

export interface Finding {
  moduleId: string;
  severity: Severity;
  category: string;
  description: string;
  location?: FindingLocation;
}

export interface ScoreReport {
  countsBySeverity: Record<Severity, number>;
  totalFindings: number;
  checklistPercentage?: number;
  checklistItems?: {
    total: number;
    failing: number;
  };
  riskLevel: RiskLevel;
}

export interface ReviewSession {
  id: string;
  status: SessionStatus;
  findings: Finding[];
  createdAt: string;
  updatedAt: string;
  finalizedAt?: string;
  report?: ScoreReport;
}
