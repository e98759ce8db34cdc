import type { CompleteTradePlan } from '@/plan/types.ts';

const rule = '-'.repeat(48);

/** Plain-text rendering of a finished plan; fields only, no further computation. */
export const formatTradePlan = (plan: CompleteTradePlan): string => {
  const { analyst } = plan;
  const lines = [
    `TRADE PLAN ${plan.symbol} [${plan.status}]`,
    rule,
    plan.executiveSummary,
    rule,
    `Analyst: ${analyst.direction} / ${analyst.conviction}`,
    `  Trend: ${analyst.technicalFactors.trend || 'n/a'}`,
  ];

  if (analyst.technicalFactors.keyLevels.length > 0) {
    lines.push(`  Key levels: ${analyst.technicalFactors.keyLevels.map((l) => (l.label ? `${l.price} (${l.label})` : `${l.price}`)).join(', ')}`);
  }
  if (analyst.technicalFactors.patternNotes) lines.push(`  Patterns: ${analyst.technicalFactors.patternNotes}`);
  if (analyst.fundamentalFactors) {
    const { news, macro, sector } = analyst.fundamentalFactors;
    if (news) lines.push(`  News: ${news}`);
    if (macro) lines.push(`  Macro: ${macro}`);
    if (sector) lines.push(`  Sector: ${sector}`);
  }
  for (const observation of analyst.keyObservations) lines.push(`  - ${observation}`);
  lines.push(`  Rationale: ${analyst.rationale}`);

  if (plan.status === 'COMPLETE') {
    const { setup, allocation } = plan;
    lines.push(
      rule,
      `Setup: ${setup.direction} entry ${setup.entry} stop ${setup.stopLoss} targets ${setup.takeProfits.join(' / ')}`,
      `  Risk per unit: ${setup.riskPerShare.toFixed(2)}  R:R ${setup.rewardToRisk.toFixed(2)}`,
    );
    if (setup.chartStructure) lines.push(`  Structure: ${setup.chartStructure}`);
    lines.push(
      `  Rationale: ${setup.rationale}`,
      rule,
      `Risk: ${(allocation.riskPct * 100).toFixed(2)}% of ${allocation.equity.toFixed(2)} = ${allocation.riskAmount.toFixed(2)}`,
      `  Size: ${allocation.positionSize} units, value ${allocation.positionValue.toFixed(2)}, at risk ${allocation.actualRiskAmount.toFixed(2)}`,
      `  ${allocation.rationale}`,
    );
  }

  lines.push(rule, `Executable: ${plan.isExecutable ? 'yes' : 'no'}`);
  return lines.join('\n');
};
