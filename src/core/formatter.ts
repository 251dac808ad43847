// core/formatter.ts
// Portuguese-style number, currency and date formatting plus derived bindings

import writtenNumber from 'written-number';
import type { BindingSet, BindingValue, DerivedBindingKind } from '../types/index.js';
import { PaperGridError } from '../types/index.js';

const PT_MONTHS = [
  'janeiro',
  'fevereiro',
  'março',
  'abril',
  'maio',
  'junho',
  'julho',
  'agosto',
  'setembro',
  'outubro',
  'novembro',
  'dezembro',
];

export interface DeriveOptions {
  issuedOn?: string;
  now?: () => Date;
}

/**
 * Convert a binding value to a number rounded half away from zero to 2 decimals
 */
export function toNumber(value: BindingValue | undefined, key = 'value'): number {
  const num = typeof value === 'number' ? value : Number(String(value ?? '').trim());

  if (value === null || value === undefined || value === '' || !Number.isFinite(num)) {
    throw new PaperGridError(
      `Not a finite number: ${key}`,
      'bindings',
      `Got ${JSON.stringify(value)}`
    );
  }

  return roundHalfUp(num);
}

export function roundHalfUp(num: number): number {
  const abs = Math.abs(num);
  // Shifting through the decimal string avoids binary artefacts (2.675 -> 2.68)
  const shifted = Number(`${Math.round(Number(`${abs}e2`))}e-2`);
  const scaled = Number.isFinite(shifted) ? shifted : Math.round(abs * 100) / 100;
  return num < 0 ? -scaled : scaled;
}

export function totalCost(qty: number, costPerUnit: number): number {
  return roundHalfUp(qty * costPerUnit);
}

/**
 * 1234.5 -> "1.234,50 €"; thousands use ".", decimals ","
 */
export function formatNumberPt(num: number, showDecimals = true, currencySymbol = '€'): string {
  const sign = num < 0 ? '-' : '';
  const fixed = Math.abs(num).toFixed(showDecimals ? 2 : 0);
  const [intPart, decPart] = fixed.split('.');

  const grouped = intPart.replace(/\B(?=(\d{3})+(?!\d))/g, '.');
  let result = sign + (showDecimals && decPart ? `${grouped},${decPart}` : grouped);

  if (currencySymbol) {
    result += ` ${currencySymbol}`;
  }

  return result;
}

function spell(num: number): string {
  return writtenNumber(num, { lang: 'pt' });
}

/**
 * 1234.5 with "euro" -> "mil, duzentos e trinta e quatro euros e cinquenta centavos".
 * Without a currency the cents follow after a comma.
 */
export function numberToWordsPt(num: number, currency?: string): string {
  const rounded = roundHalfUp(num);
  const [intText, decText] = Math.abs(rounded).toFixed(2).split('.');
  const intPart = parseInt(intText, 10);
  const decPart = parseInt(decText ?? '0', 10);

  let words = spell(intPart);
  if (intPart > 1000 && intPart % 1000 !== 0) {
    words = words.replace(/\bmil (e )?/, 'mil, ');
  }
  if (rounded < 0) {
    words = `menos ${words}`;
  }

  if (!currency) {
    return decPart > 0 ? `${words}, ${spell(decPart)}` : words;
  }

  let result = `${words} ${intPart === 1 ? currency : `${currency}s`}`;
  if (decPart > 0) {
    result += ` e ${spell(decPart)} ${decPart === 1 ? 'centavo' : 'centavos'}`;
  }
  return result;
}

export function portugueseMonth(month: number): string {
  return PT_MONTHS[month - 1] ?? '';
}

/**
 * "outubro de 2026" from an ISO date (YYYY-MM-DD) or a Date
 */
export function formatIssueDate(date: string | Date): string {
  if (typeof date === 'string') {
    const match = date.match(/^(\d{4})-(\d{2})-(\d{2})$/);
    if (!match) {
      throw new PaperGridError(`Invalid issue date: ${date}`, 'issued_on', 'Expected YYYY-MM-DD');
    }
    return `${portugueseMonth(parseInt(match[2], 10))} de ${match[1]}`;
  }
  return `${portugueseMonth(date.getMonth() + 1)} de ${date.getFullYear()}`;
}

/**
 * Add computed bindings; the input set is not modified
 */
export function deriveBindings(
  bindings: BindingSet,
  kinds: DerivedBindingKind[],
  options: DeriveOptions = {}
): BindingSet {
  const result: BindingSet = { ...bindings };

  if (kinds.includes('date')) {
    const now = options.now ?? (() => new Date());
    result.date = formatIssueDate(options.issuedOn ?? now());
  }

  if (kinds.includes('costs') && 'qty' in bindings && 'cost_per_unit' in bindings) {
    const qty = toNumber(bindings.qty, 'qty');
    const costPerUnit = toNumber(bindings.cost_per_unit, 'cost_per_unit');
    const total = totalCost(qty, costPerUnit);

    result.qty = formatNumberPt(qty, true, '');
    result.cost_per_unit = formatNumberPt(costPerUnit);
    result.total_cost = formatNumberPt(total);
    result.total_cost_words = numberToWordsPt(total, 'euro');
  }

  return result;
}
