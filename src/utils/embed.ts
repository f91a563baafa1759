import { EmbedBuilder } from 'discord.js';
import type { Alert, ChangeEvent, ErrorReport, PriceRange, TargetRangeHit } from '../types.js';

const COLORS = {
  decrease: 0x00ff00,
  increase: 0xff9900,
  targetRange: 0x3b82f6,
  error: 0xff0000,
} as const;

const TITLES = {
  decrease: 'Price Drop',
  increase: 'Price Increase',
} as const;

const CURRENCY_SYMBOLS: Record<string, string> = {
  GBP: '£',
  USD: '$',
  EUR: '€',
};

export function formatMoney(amount: number, currency: string): string {
  const symbol = CURRENCY_SYMBOLS[currency];
  const sign = amount < 0 ? '-' : '';
  const value = Math.abs(amount).toFixed(2);
  return symbol ? `${sign}${symbol}${value}` : `${sign}${value} ${currency}`;
}

export function formatPercent(deltaPercent: number): string {
  const sign = deltaPercent > 0 ? '+' : '';
  return `${sign}${deltaPercent.toFixed(1)}%`;
}

export function describeChange(event: ChangeEvent): string {
  const { previous, current, deltaPercent, itemId } = event;
  return `${itemId}: ${formatMoney(previous.price, previous.currency)} → ${formatMoney(current.price, current.currency)} (${formatPercent(deltaPercent)})`;
}

export function formatRange(range: PriceRange, currency: string): string {
  return `${formatMoney(range.min, currency)}-${formatMoney(range.max, currency)}`;
}

export function describeAlert(alert: Alert): string {
  switch (alert.type) {
    case 'change':
      return describeChange(alert.event);
    case 'targetRange': {
      const { itemId, sample, range } = alert.hit;
      return `${itemId}: ${formatMoney(sample.price, sample.currency)} is within target ${formatRange(range, sample.currency)}`;
    }
    case 'error':
      return `${alert.report.itemId}: ${alert.report.kind} (${alert.report.consecutiveFailures} failures) ${alert.report.message}`;
  }
}

export function createAlertEmbed(alert: Alert): EmbedBuilder {
  switch (alert.type) {
    case 'change':
      return createChangeEmbed(alert.event);
    case 'targetRange':
      return createTargetRangeEmbed(alert.hit);
    case 'error':
      return createErrorEmbed(alert.report);
  }
}

export function createChangeEmbed(event: ChangeEvent): EmbedBuilder {
  const { previous, current, direction, itemId } = event;

  const embed = new EmbedBuilder()
    .setColor(COLORS[direction])
    .setTitle(`${TITLES[direction]}: ${current.source.title ?? itemId}`)
    .setTimestamp(new Date(current.timestamp))
    .setFooter({ text: 'Price Monitor' });

  embed.addFields(
    {
      name: 'Price',
      value: `~~${formatMoney(previous.price, previous.currency)}~~ → **${formatMoney(current.price, current.currency)}** (${formatPercent(event.deltaPercent)})`,
      inline: true,
    },
    {
      name: 'Change',
      value: formatMoney(event.delta, current.currency),
      inline: true,
    }
  );

  if (current.source.retailer) {
    embed.addFields({ name: 'Retailer', value: current.source.retailer, inline: true });
  }

  if (current.source.link) {
    embed.setURL(current.source.link);
    embed.addFields({ name: 'Buy Now', value: `[View Product](${current.source.link})`, inline: false });
  }

  return embed;
}

export function createTargetRangeEmbed(hit: TargetRangeHit): EmbedBuilder {
  const { sample, range, itemId } = hit;

  const embed = new EmbedBuilder()
    .setColor(COLORS.targetRange)
    .setTitle(`Target Price: ${sample.source.title ?? itemId}`)
    .setTimestamp(new Date(sample.timestamp))
    .setFooter({ text: 'Price Monitor' })
    .addFields(
      { name: 'Current Price', value: formatMoney(sample.price, sample.currency), inline: true },
      { name: 'Target Range', value: formatRange(range, sample.currency), inline: true }
    );

  if (sample.source.retailer) {
    embed.addFields({ name: 'Retailer', value: sample.source.retailer, inline: true });
  }

  if (sample.source.link) {
    embed.setURL(sample.source.link);
    embed.addFields({ name: 'Buy Now', value: `[View Product](${sample.source.link})`, inline: false });
  }

  return embed;
}

export function createErrorEmbed(report: ErrorReport): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(COLORS.error)
    .setTitle('Price Monitor Error')
    .setDescription(report.message || report.kind)
    .setTimestamp(new Date(report.timestamp))
    .setFooter({ text: 'Price Monitor' })
    .addFields(
      { name: 'Item', value: report.itemId, inline: true },
      { name: 'Error', value: report.kind, inline: true },
      { name: 'Failures', value: String(report.consecutiveFailures), inline: true }
    );
}
