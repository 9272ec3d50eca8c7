// ============================================================================
// src/presentation/commands/index.ts
// ============================================================================

import { type AdminCommandDeps, createAdminCommand } from '@/presentation/commands/admin/admin';
import {
  commandRegistry,
  getRegisteredCommands,
  registerCommands,
  serializeCommands,
} from '@/presentation/commands/command-registry';
import { complaintCommand } from '@/presentation/commands/general/complaint';
import { helpCommand } from '@/presentation/commands/general/help';
import { createLimitsCommand, type LimitsCommandDeps } from '@/presentation/commands/general/limits';
import { pingCommand } from '@/presentation/commands/general/ping';
import { createMasterCommand, type MasterCommandDeps } from '@/presentation/commands/masters/master';
import { createMyRequestsCommand, type MyRequestsCommandDeps } from '@/presentation/commands/requests/my-requests';
import { requestCommand } from '@/presentation/commands/requests/request';
import type { Command } from '@/presentation/commands/types';

export type MarketplaceCommandDeps = MasterCommandDeps &
  AdminCommandDeps &
  MyRequestsCommandDeps &
  LimitsCommandDeps;

export const registerMarketplaceCommands = (deps: MarketplaceCommandDeps): ReadonlyArray<Command> => {
  const commands: Command[] = [
    pingCommand,
    helpCommand,
    createLimitsCommand(deps),
    complaintCommand,
    requestCommand,
    createMyRequestsCommand(deps),
    createMasterCommand(deps),
    createAdminCommand(deps),
  ];

  registerCommands(commands);
  return commands;
};

export { commandRegistry, getRegisteredCommands, serializeCommands };
