/**
 * Human-readable run report, written beside artifacts.json.
 */

import type { ArtifactDocument, WorkerOutcome } from '../types.js';

function describeOutcome(outcome: WorkerOutcome): string {
  if (outcome.status === 'skipped') {
    return `- ${outcome.step}: skipped (${outcome.reason ?? 'not planned'})`;
  }
  const where = `attempt ${outcome.attempt}, retry ${outcome.retry}`;
  if (outcome.status === 'failed') {
    return `- ${outcome.step}: failed [${outcome.error_kind ?? 'fatal'}] (${where}): ${outcome.error_message ?? 'unknown error'}`;
  }
  return `- ${outcome.step}: succeeded (${where}, ${outcome.duration_ms} ms)`;
}

export function renderSummary(document: ArtifactDocument): string {
  const { input, worker_plan: plan, result } = document;
  const lines = [
    `# Campaign Run ${document.run_id}`,
    '',
    `- Brand: ${input.brand_id}`,
    ...(input.campaign_id ? [`- Campaign: ${input.campaign_id}`] : []),
    `- Objective: ${input.objective}`,
    `- Days: ${input.days}`,
    `- Build executed: ${input.build}`,
    `- Status: ${result.status}`,
    `- Plan mode: ${plan.mode} (${plan.reason})`,
    `- Cost (USD): ${result.cost_usd.toFixed(4)}`,
    `- Duration: ${result.duration_ms} ms`,
    `- QA: ${result.qa.resolution} after ${result.qa.attempts} attempt(s)`,
  ];

  if (document.input_translation) {
    lines.push(`- Input translation: ${document.input_translation.mode} (${document.input_translation.reason})`);
  }
  if (result.error) {
    lines.push(`- Error: ${result.error}`);
  }

  lines.push('', '## Workers', '', '| Step | Run | Reason |', '| --- | --- | --- |');
  for (const step of plan.workers) {
    lines.push(`| ${step.name} | ${step.will_run ? 'yes' : 'no'} | ${step.reason} |`);
  }

  lines.push('', '## Trace', '');
  lines.push(...document.orchestration_trace.map(describeOutcome));

  lines.push('', 'Artifacts:', '- artifacts.json', '- trace.jsonl', '');
  return lines.join('\n');
}
