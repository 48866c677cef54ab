/**
 * resources command - List registered resource and data-source types.
 */

import type { CommandContext, CommandResult } from '../types.js';
import { header, info } from '../utils/output.js';

export interface ResourcesData {
  resources: string[];
  dataSources: string[];
}

export async function resourcesCommand(ctx: CommandContext): Promise<CommandResult<ResourcesData>> {
  const { outputFormat, provider } = ctx;
  const data: ResourcesData = {
    resources: provider.resourceTypeNames(),
    dataSources: provider.dataSourceTypeNames(),
  };

  if (outputFormat === 'human') {
    header('Resources');
    data.resources.forEach((name) => info(name));
    header('Data Sources');
    data.dataSources.forEach((name) => info(name));
  }

  return {
    success: true,
    message: `${data.resources.length} resource types, ${data.dataSources.length} data sources`,
    data,
  };
}
