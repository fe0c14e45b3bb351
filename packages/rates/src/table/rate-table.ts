import { NotFoundError, RateUndefinedError, normalizeText } from '@posledger/core';
import type { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import type { RateDocument } from '../document/rate-document.schemas.js';

export interface BankRateSet {
  readonly id: string;
  readonly name: string;
  readonly aliases: readonly string[];
  /** installment count → expected rate (fraction) */
  readonly rates: ReadonlyMap<number, Decimal>;
}

export interface RateEntry {
  readonly bank: string;
  readonly installment: number;
  readonly rate: Decimal;
}

export type RateLookupError = NotFoundError | RateUndefinedError;

function sortedRates(rates: ReadonlyMap<number, Decimal>): Map<number, Decimal> {
  return new Map([...rates.entries()].sort(([a], [b]) => a - b));
}

function freezeBank(bank: BankRateSet): BankRateSet {
  return Object.freeze({
    aliases: Object.freeze([...bank.aliases]),
    id: bank.id,
    name: bank.name,
    rates: sortedRates(bank.rates),
  });
}

/**
 * One immutable version of the expected-rate table. Mutations build a new
 * table; a reader holding a reference never sees a half-applied change.
 */
export class RateTable {
  private readonly banksById: ReadonlyMap<string, BankRateSet>;

  constructor(
    banks: Iterable<BankRateSet>,
    readonly version: number
  ) {
    const frozen = [...banks].map(freezeBank).sort((a, b) => a.id.localeCompare(b.id));
    this.banksById = new Map(frozen.map((bank) => [bank.id, bank]));
  }

  static empty(): RateTable {
    return new RateTable([], 0);
  }

  static fromDocument(document: RateDocument): RateTable {
    const banks = Object.entries(document.banks).map(([id, bank]) => ({
      aliases: bank.aliases,
      id,
      name: bank.name,
      rates: new Map(Object.entries(bank.rates).map(([installment, rate]) => [Number(installment), rate])),
    }));
    return new RateTable(banks, document.version);
  }

  get bankIds(): string[] {
    return [...this.banksById.keys()];
  }

  get banks(): BankRateSet[] {
    return [...this.banksById.values()];
  }

  bank(id: string): BankRateSet | undefined {
    return this.banksById.get(id);
  }

  /**
   * Resolve an id or a statement-reported bank name: exact id, then
   * normalized equality with the id, name or an alias, then the longest
   * id/name/alias contained in the given name.
   */
  resolveBank(nameOrId: string): BankRateSet | undefined {
    const exact = this.banksById.get(nameOrId);
    if (exact) return exact;

    const query = normalizeText(nameOrId);
    if (query === '') return undefined;

    const labelsOf = (bank: BankRateSet) => [bank.id, bank.name, ...bank.aliases].map(normalizeText).filter((label) => label !== '');

    for (const bank of this.banksById.values()) {
      if (labelsOf(bank).includes(query)) return bank;
    }

    let best: { bank: BankRateSet; length: number } | undefined;
    for (const bank of this.banksById.values()) {
      for (const label of labelsOf(bank)) {
        if (query.includes(label) && (!best || label.length > best.length)) {
          best = { bank, length: label.length };
        }
      }
    }
    return best?.bank;
  }

  /**
   * Expected rate for a bank and installment count. A count below 1 is a
   * single payment.
   */
  lookup(bank: string, installmentCount: number): Result<Decimal, RateLookupError> {
    const resolved = this.resolveBank(bank);
    if (!resolved) {
      return err(new NotFoundError(`Unknown bank "${bank}"`, { additionalContext: { bank } }));
    }
    const count = Math.max(installmentCount, 1);
    const rate = resolved.rates.get(count);
    if (rate === undefined) {
      return err(new RateUndefinedError(resolved.id, count));
    }
    return ok(rate);
  }

  /**
   * All (bank, installment, rate) entries, ordered by bank id then count.
   */
  entries(): RateEntry[] {
    return this.banks.flatMap((bank) =>
      [...bank.rates.entries()].map(([installment, rate]) => ({ bank: bank.id, installment, rate }))
    );
  }

  /**
   * Copy with some of one bank's rates replaced, at the given version.
   */
  withRates(bankId: string, rates: ReadonlyMap<number, Decimal>, version: number): RateTable {
    return new RateTable(
      this.banks.map((bank) => (bank.id === bankId ? { ...bank, rates: new Map([...bank.rates, ...rates]) } : bank)),
      version
    );
  }

  withVersion(version: number): RateTable {
    return new RateTable(this.banks, version);
  }
}
