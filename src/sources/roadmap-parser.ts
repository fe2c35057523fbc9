/**
 * Roadmap markdown parser
 *
 * Recognized layout:
 *
 *   ## Now | Next | Later | Future      horizon section
 *   ### Item name  (or ####)            roadmap item
 *   free text lines                     item description
 *   Depends on: a, b                    item dependencies
 *
 * Any other `#`/`##` header closes the current item. Items appearing before
 * the first horizon section land in `future`.
 */

import { roadmapItemId } from '../core/entities.js';
import type { Horizon, RoadmapItemEntity } from '../core/types.js';

const HORIZON_HEADER = /^##\s+(Now|Next|Later|Future)\b/i;
const ITEM_HEADER = /^#{3,4}\s+(.+)$/;
const OTHER_HEADER = /^#{1,2}\s/;
const DEPENDS_ON = /^\s*(?:[-*]\s+)?\**depends on\**:?\**\s*(.*)$/i;

function toHorizon(value: string): Horizon {
  switch (value.toLowerCase()) {
    case 'now':
      return 'now';
    case 'next':
      return 'next';
    case 'later':
      return 'later';
    default:
      return 'future';
  }
}

interface ItemDraft {
  name: string;
  horizon: Horizon;
  lines: string[];
  dependencies: string[];
}

function finish(draft: ItemDraft): RoadmapItemEntity {
  return {
    kind: 'roadmap_item',
    id: roadmapItemId(draft.name),
    name: draft.name,
    description: draft.lines.join(' ').trim(),
    horizon: draft.horizon,
    dependencies: draft.dependencies
  };
}

export function parseRoadmap(markdown: string): RoadmapItemEntity[] {
  const items: RoadmapItemEntity[] = [];
  let horizon: Horizon = 'future';
  let current: ItemDraft | undefined;

  const flush = () => {
    if (current) {
      items.push(finish(current));
      current = undefined;
    }
  };

  for (const line of markdown.split(/\r?\n/)) {
    const horizonMatch = HORIZON_HEADER.exec(line);
    if (horizonMatch) {
      flush();
      horizon = toHorizon(horizonMatch[1]);
      continue;
    }

    const itemMatch = ITEM_HEADER.exec(line);
    if (itemMatch) {
      flush();
      const name = itemMatch[1].replace(/#+\s*$/, '').trim();
      if (name.length > 0) {
        current = { name, horizon, lines: [], dependencies: [] };
      }
      continue;
    }

    if (OTHER_HEADER.test(line)) {
      flush();
      continue;
    }

    if (!current || line.trim().length === 0) {
      continue;
    }

    const dependsMatch = DEPENDS_ON.exec(line);
    if (dependsMatch) {
      current.dependencies.push(
        ...dependsMatch[1]
          .split(',')
          .map(dependency => dependency.trim())
          .filter(dependency => dependency.length > 0)
      );
      continue;
    }

    current.lines.push(line.trim());
  }

  flush();
  return items;
}
