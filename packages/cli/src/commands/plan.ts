import { unwrap } from '@kubeql/shared';
import type { Config } from '@kubeql/shared';
import { translate } from '@kubeql/planner';
import { renderJson } from '../printer.js';

export function planCommand(sql: string, config: Config): string {
  return renderJson(unwrap(translate(sql, { dialect: config.parser.dialect })));
}
