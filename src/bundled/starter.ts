export const starterManifest = `# Review modules, in registration order.
# category: core | specialized | tech_stack | checklist
modules:
  - id: review-core
    title: Review method and severity scale
    category: core
    tokenEstimate: 900
    tags: [security, performance]

  - id: injection
    title: Injection flaws
    category: specialized
    tokenEstimate: 1800
    dependencies: [review-core]
    tags: [security]

  - id: query-performance
    title: Query and data access performance
    category: specialized
    tokenEstimate: 1400
    dependencies: [review-core]
    tags: [performance]

  - id: node-express
    title: Node.js and Express specifics
    category: tech_stack
    tokenEstimate: 1200
    dependencies: [injection]
    tags: [node]

  - id: security-checklist
    title: Pre-release security checklist
    category: checklist
    tokenEstimate: 600
    checklistItems: 20
    tags: [security]

goals:
  security-audit: [injection, security-checklist]
  performance-pass: [query-performance]
`;

export const starterContent: Record<string, string> = {
  'review-core': `# Review method

Report each finding with a severity:

- P0: fix now
- P1: fix this week
- P2: fix within 30 days
- P3: backlog
`,
  'injection': `# Injection flaws

Trace every external input to the query, command, or template that consumes it.
`,
  'query-performance': `# Query performance

Look for queries inside loops, missing indexes, and unbounded result sets.
`,
  'node-express': `# Node.js and Express

Check middleware order, body size limits, and error handlers that leak stack traces.
`,
  'security-checklist': `# Security checklist

Mark each item pass or fail; every failing item is a finding.
`,
};
