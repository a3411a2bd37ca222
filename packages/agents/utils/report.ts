// Markdown report for one run and its recommendation

import type { OrchestrationRun } from '../types/orchestration.js';
import type { Recommendation } from '../types/decision.js';
import { PILLAR_LABELS } from '../config/pillar-mappings.js';
import { NEUTRAL_SCORE } from '../decision/score-extractor.js';

export function formatPercent(value: number): string {
  return `${(value * 100).toFixed(1)}%`;
}

export function formatCategory(category: Recommendation['category']): string {
  return category.replace(/_/g, ' ');
}

export function renderReport(run: OrchestrationRun, recommendation: Recommendation): string {
  const sections: string[] = [];
  const { basis } = recommendation;

  sections.push(`# Scenario Assessment: ${formatCategory(recommendation.category)}\n`);
  sections.push(`**Run ID**: ${run.runId}`);
  sections.push(`**Overall Score**: ${formatPercent(recommendation.overallScore)}`);
  sections.push(`**Confidence**: ${formatPercent(recommendation.confidence)}`);
  sections.push(`**Pillars**: ${basis.succeeded}/${basis.total} succeeded${run.cancelled ? ' (cancelled)' : ''}`);
  if (recommendation.degraded) {
    sections.push('\n> No pillar produced a usable result. Scores are neutral placeholders.');
  }
  sections.push('\n---\n');

  sections.push('## Pillar Scores\n');
  sections.push('| Pillar | Status | Score | Duration |');
  sections.push('|--------|--------|-------|----------|');
  for (const pillar of run.pillars) {
    const result = run.results[pillar];
    const score = recommendation.pillarScores[pillar] ?? NEUTRAL_SCORE;
    const status = result?.status ?? 'missing';
    const duration = result ? `${result.durationMs} ms` : '-';
    sections.push(`| ${PILLAR_LABELS[pillar]} | ${status} | ${formatPercent(score)} | ${duration} |`);
  }
  sections.push('');

  if (recommendation.insights.length > 0) {
    sections.push('## Key Insights\n');
    for (const insight of recommendation.insights) sections.push(`- ${insight.message}`);
    sections.push('');
  }

  sections.push('## Action Items\n');
  for (const item of recommendation.actionItems) sections.push(`${item.priority}. ${item.action}`);
  sections.push('');

  const risk = recommendation.riskAssessment;
  sections.push('## Risk Assessment\n');
  sections.push(`**Level**: ${risk.level}`);
  sections.push(`**Mitigation required**: ${risk.mitigationRequired ? 'yes' : 'no'}`);
  for (const factor of risk.factors) sections.push(`- ${factor}`);
  sections.push('');

  sections.push('## Rationale\n');
  sections.push(recommendation.rationale);
  sections.push('');

  sections.push('## Next Steps\n');
  for (const step of recommendation.nextSteps) sections.push(`- ${step}`);

  const failed = run.pillars.flatMap(pillar => {
    const result = run.results[pillar];
    return result?.status === 'failed' ? [{ pillar, error: result.error }] : [];
  });
  if (failed.length > 0) {
    sections.push('\n## Failed Pillars\n');
    for (const { pillar, error } of failed) {
      sections.push(`- **${PILLAR_LABELS[pillar]}** (${error.code}): ${error.message}`);
    }
  }

  return sections.join('\n');
}
