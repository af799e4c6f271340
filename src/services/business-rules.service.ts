import { Injectable, Logger } from '@nestjs/common';
import { CanonicalRecord } from '../interfaces/canonical-record.interface';
import {
  BUSINESS_RULE_ORDER,
  BusinessRule,
  BusinessRuleName,
} from '../interfaces/business-rule.interface';
import { DefaultMissingPricesRule } from '../strategies/rules/default-missing-prices.rule';
import { MarkUnratedRule } from '../strategies/rules/mark-unrated.rule';
import { RequireProvenanceRule } from '../strategies/rules/require-provenance.rule';

export interface BusinessRulesResult {
  records: CanonicalRecord[];

  /** Records changed per rule */
  mutations: Partial<Record<BusinessRuleName, number>>;

  /** Records removed per rule */
  drops: Partial<Record<BusinessRuleName, number>>;
}

/**
 * Business Rules Service
 *
 * Runs the enabled product-policy rules over the deduplicated set, one
 * full pass per rule, always in the order: default missing prices, mark
 * unrated, require provenance.
 */
@Injectable()
export class BusinessRulesService {
  private readonly logger = new Logger(BusinessRulesService.name);
  private readonly rules: Map<BusinessRuleName, BusinessRule>;

  constructor(
    defaultMissingPrices: DefaultMissingPricesRule,
    markUnrated: MarkUnratedRule,
    requireProvenance: RequireProvenanceRule,
  ) {
    this.rules = new Map<BusinessRuleName, BusinessRule>([
      [defaultMissingPrices.name, defaultMissingPrices],
      [markUnrated.name, markUnrated],
      [requireProvenance.name, requireProvenance],
    ]);
  }

  apply(
    records: CanonicalRecord[],
    enabledRules: readonly BusinessRuleName[] = BUSINESS_RULE_ORDER,
  ): BusinessRulesResult {
    const mutations: Partial<Record<BusinessRuleName, number>> = {};
    const drops: Partial<Record<BusinessRuleName, number>> = {};
    let current = records;

    for (const name of BUSINESS_RULE_ORDER) {
      const rule = this.rules.get(name);
      if (!rule || !enabledRules.includes(name)) {
        continue;
      }

      const next: CanonicalRecord[] = [];
      let mutated = 0;
      let dropped = 0;

      for (const record of current) {
        const outcome = rule.apply(record);
        if (outcome.action === 'dropped') {
          dropped++;
          continue;
        }
        if (outcome.action === 'mutated') {
          mutated++;
        }
        next.push(outcome.record);
      }

      mutations[name] = mutated;
      drops[name] = dropped;
      current = next;

      this.logger.log(`Rule ${name}: ${mutated} changed, ${dropped} dropped`);
    }

    return { records: current, mutations, drops };
  }
}
