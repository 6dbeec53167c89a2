/**
 * Post-processing of a planned group: replaces placeholder tokens in the
 * group title, stage text, task summaries and manual task messages.
 *
 * Only manual task messages are rendered with their service/component, so
 * host tokens resolve there and nowhere else.
 */

import type { UpgradeGroupHolder } from '../upgrade/types.js';
import { tokenReplace, type PlaceholderDeps } from './placeholders.js';

export function postProcess(deps: PlaceholderDeps, holder: UpgradeGroupHolder): void {
  holder.title = tokenReplace(deps, holder.title);

  for (const stage of holder.items) {
    if (stage.text !== undefined) {
      stage.text = tokenReplace(deps, stage.text);
    }

    for (const wrapper of stage.tasks) {
      for (const task of wrapper.tasks) {
        if (task.summary !== undefined) {
          task.summary = tokenReplace(deps, task.summary);
        }

        if (task.type === 'MANUAL') {
          task.messages = task.messages.map((message) =>
            tokenReplace(deps, message, {
              service: wrapper.service,
              component: wrapper.component,
            })
          );
        }
      }
    }
  }
}
