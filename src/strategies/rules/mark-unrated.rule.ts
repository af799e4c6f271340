import { Injectable } from '@nestjs/common';
import { CanonicalRecord } from '../../interfaces/canonical-record.interface';
import { BusinessRule, RuleOutcome } from '../../interfaces/business-rule.interface';
import { UNRATED } from '../../utils/rating';

/**
 * Mark Unrated
 *
 * A rating without any reviews behind it is not shown: records with no
 * review count, or a count of zero, are marked "Not yet rated" whatever
 * their numeric rating was.
 */
@Injectable()
export class MarkUnratedRule implements BusinessRule {
  readonly name = 'mark-unrated';

  apply(record: CanonicalRecord): RuleOutcome {
    if (record.reviewCount !== null && record.reviewCount > 0) {
      return { action: 'unchanged', record };
    }
    if (record.rating.kind === 'unrated') {
      return { action: 'unchanged', record };
    }
    return { action: 'mutated', record: { ...record, rating: UNRATED } };
  }
}
