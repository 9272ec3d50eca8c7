// ============================================================================
// src/presentation/commands/admin/admin.ts
// ============================================================================

import {
  type ChatInputCommandInteraction,
  MessageFlags,
  PermissionFlagsBits,
  SlashCommandBuilder,
} from 'discord.js';

import type { ReconciliationSweep, SweepReport } from '@/application/services/ReconciliationSweep';
import type { GetServiceStatsUseCase } from '@/application/usecases/admin/GetServiceStatsUseCase';
import type { GrantEntitlementUseCase } from '@/application/usecases/billing/GrantEntitlementUseCase';
import { ENTITLEMENT_PRODUCTS, PAYMENT_PAYLOADS } from '@/domain/value-objects/Entitlement';
import type { Command } from '@/presentation/commands/types';
import { embedFactory } from '@/presentation/embeds/EmbedFactory';
import { UnauthorizedActionError } from '@/shared/errors/domain.errors';
import { formatDate, formatDateTime } from '@/shared/utils/text';

export interface AdminCommandDeps {
  readonly adminUserIds: ReadonlyArray<string>;
  readonly getStats: GetServiceStatsUseCase;
  readonly grantEntitlement: GrantEntitlementUseCase;
  readonly sweep: ReconciliationSweep;
}

export const describeSweepReport = (report: SweepReport, pendingDocuments: number): string =>
  [
    `Автозавершено заказов: ${report.autoCompleted} (ошибок: ${report.autoCompleteErrors})`,
    `Очищено анкет: ${report.documentsPurged} (ошибок: ${report.purgeErrors})`,
    `Удалено ключей лимитов: ${report.rateLimitKeysRemoved}`,
    `Ожидают очистки: ${pendingDocuments}`,
    report.failedDuties.length > 0 ? `Сбои: ${report.failedDuties.join(', ')}` : 'Сбоев нет',
    `Завершено: ${formatDateTime(report.finishedAt)}`,
  ].join('\n');

const runSweep = async (interaction: ChatInputCommandInteraction, sweep: ReconciliationSweep): Promise<void> => {
  const report = await sweep.runCycle();
  const pending = await sweep.pendingDocumentCount();
  const content = { title: '🧹 Обслуживание выполнено', description: describeSweepReport(report, pending) };

  await interaction.editReply({
    embeds: [report.failedDuties.length > 0 ? embedFactory.warning(content) : embedFactory.success(content)],
  });
};

const runGrant = async (interaction: ChatInputCommandInteraction, useCase: GrantEntitlementUseCase): Promise<void> => {
  const user = interaction.options.getUser('user', true);
  const result = await useCase.execute({
    masterUserId: user.id,
    payload: interaction.options.getString('payload', true),
    providerChargeId: interaction.options.getString('charge_id') ?? undefined,
  });

  await interaction.editReply({
    embeds: [
      embedFactory.success({
        title: '💳 Оплата зачислена',
        description: `${ENTITLEMENT_PRODUCTS[result.payload].title} для мастера #${result.masterId} активна до ${formatDate(result.until)}.`,
      }),
    ],
  });
};

export const createAdminCommand = (deps: AdminCommandDeps): Command => ({
  data: new SlashCommandBuilder()
    .setName('admin')
    .setDescription('Инструменты администратора.')
    .setDefaultMemberPermissions(PermissionFlagsBits.Administrator)
    .addSubcommand((sub) => sub.setName('stats').setDescription('Статистика сервиса.'))
    .addSubcommand((sub) => sub.setName('sweep').setDescription('Запустить обслуживание вручную.'))
    .addSubcommand((sub) =>
      sub
        .setName('grant')
        .setDescription('Зачислить оплату мастеру.')
        .addUserOption((option) => option.setName('user').setDescription('Мастер').setRequired(true))
        .addStringOption((option) =>
          option
            .setName('payload')
            .setDescription('Что оплачено')
            .setRequired(true)
            .addChoices(...PAYMENT_PAYLOADS.map((payload) => ({ name: ENTITLEMENT_PRODUCTS[payload].title, value: payload }))),
        )
        .addStringOption((option) =>
          option.setName('charge_id').setDescription('Идентификатор платежа').setMaxLength(128),
        ),
    )
    .addSubcommand((sub) => sub.setName('prices').setDescription('Прайс платных опций.')),
  category: 'Администрирование',
  examples: ['/admin stats', '/admin grant user:@master payload:sub_30d'],
  async execute(interaction) {
    const subcommand = interaction.options.getSubcommand();

    if (!deps.adminUserIds.includes(interaction.user.id)) {
      throw new UnauthorizedActionError(`admin:${subcommand}`);
    }

    await interaction.deferReply({ flags: MessageFlags.Ephemeral });

    switch (subcommand) {
      case 'stats':
        await interaction.editReply({ embeds: [embedFactory.serviceStats(await deps.getStats.execute())] });
        return;
      case 'sweep':
        await runSweep(interaction, deps.sweep);
        return;
      case 'grant':
        await runGrant(interaction, deps.grantEntitlement);
        return;
      default:
        await interaction.editReply({ embeds: [embedFactory.priceList()] });
    }
  },
});
