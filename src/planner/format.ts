/**
 * Plain-text rendering of a planned sequence
 */

import type { UpgradeContext } from '../upgrade/context.js';
import { getDirectionText } from '../upgrade/direction.js';
import type { UpgradeGroupHolder } from '../upgrade/types.js';
import type { SequenceResult } from './sequence.js';

export interface PlanSummary {
  packName: string;
  direction: string;
  type: string;
  version: string;
  groupCount: number;
  stageCount: number;
  taskCount: number;
}

export function summarizePlan(
  packName: string,
  context: UpgradeContext,
  groups: UpgradeGroupHolder[]
): PlanSummary {
  const stages = groups.flatMap((group) => group.items);
  return {
    packName,
    direction: context.direction,
    type: context.type,
    version: context.repositoryVersion.version,
    groupCount: groups.length,
    stageCount: stages.length,
    taskCount: stages.reduce((total, stage) => total + stage.tasks.length, 0),
  };
}

export function formatPlanSummary(
  packName: string,
  context: UpgradeContext,
  result: SequenceResult
): string {
  const { groups, accumulator } = result;
  const summary = summarizePlan(packName, context, groups);
  const lines: string[] = [];

  lines.push('Upgrade Plan Summary');
  lines.push('====================');
  lines.push('');
  lines.push(`Pack: ${summary.packName}`);
  lines.push(`Direction: ${getDirectionText(context.direction, true)}`);
  lines.push(`Type: ${summary.type}`);
  lines.push(`Version: ${summary.version}`);
  lines.push('');

  groups.forEach((group, groupIndex) => {
    const flags = [group.skippable ? 'skippable' : '', group.allowRetry ? 'retry' : '']
      .filter(Boolean)
      .join(', ');
    lines.push(`${groupIndex + 1}. ${group.title}${flags ? ` (${flags})` : ''}`);
    group.items.forEach((stage, stageIndex) => {
      lines.push(`   ${groupIndex + 1}.${stageIndex + 1} ${stage.text ?? stage.type}`);
      for (const wrapper of stage.tasks) {
        const params = Object.entries(wrapper.params).map(([key, value]) => `${key}=${value}`);
        const suffix = params.length > 0 ? ` [${params.join(', ')}]` : '';
        lines.push(`       - ${wrapper.service}/${wrapper.component} on ${wrapper.hosts.join(', ')}${suffix}`);
      }
    });
  });
  if (groups.length > 0) lines.push('');

  lines.push(`Groups: ${summary.groupCount}  Stages: ${summary.stageCount}  Tasks: ${summary.taskCount}`);

  if (accumulator.unhealthyHosts.length > 0) {
    lines.push('');
    lines.push('Unhealthy hosts:');
    for (const host of accumulator.unhealthyHosts) {
      lines.push(`  ⚠ ${host}`);
    }
  }

  if (accumulator.skips.length > 0) {
    lines.push('');
    lines.push('Skipped:');
    for (const skip of accumulator.skips) {
      const target = [skip.service, skip.component].filter(Boolean).join('/');
      lines.push(`  - ${skip.group}${target ? ` ${target}` : ''}: ${skip.reason}`);
    }
  }

  return lines.join('\n');
}
