import { Injectable } from '@nestjs/common';
import { CanonicalRecord } from '../../interfaces/canonical-record.interface';
import { BusinessRule, RuleOutcome } from '../../interfaces/business-rule.interface';

/**
 * Default Missing Prices
 *
 * An unknown charged price is treated as free: when `discountedPrice` is
 * null, both prices become 0.0. A record with a charged price keeps both
 * of its prices, even when the original price is unknown. Lossy on
 * purpose; the report counts how many records it touched.
 */
@Injectable()
export class DefaultMissingPricesRule implements BusinessRule {
  readonly name = 'default-missing-prices';

  apply(record: CanonicalRecord): RuleOutcome {
    if (record.discountedPrice !== null) {
      return { action: 'unchanged', record };
    }

    return {
      action: 'mutated',
      record: {
        ...record,
        discountedPrice: 0,
        originalPrice: 0,
      },
    };
  }
}
