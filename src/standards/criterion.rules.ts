import { BadRequestException } from '@nestjs/common';
import { CriterionDataType } from '../compliance/compliance.types';

interface CriterionShape {
  dataType: CriterionDataType;
  limitMin: number | null;
  limitMax: number | null;
  options: readonly string[] | null;
  acceptableOptions: readonly string[] | null;
}

/**
 * Cross-field rules for a criterion after defaults and edits are merged.
 */
export function assertCriterionShape(criterion: CriterionShape): void {
  const { dataType, limitMin, limitMax } = criterion;
  const hasLimits = limitMin !== null || limitMax !== null;

  if (hasLimits && dataType !== 'numeric') {
    throw new BadRequestException(
      `Limits apply to numeric criteria only, not ${dataType}`,
    );
  }
  if (limitMin !== null && limitMax !== null && limitMin > limitMax) {
    throw new BadRequestException(
      `limitMin (${limitMin}) must not exceed limitMax (${limitMax})`,
    );
  }

  const isSelect = dataType === 'select' || dataType === 'multiselect';
  if (!isSelect && criterion.acceptableOptions !== null) {
    throw new BadRequestException(
      `Acceptable options apply to select criteria only, not ${dataType}`,
    );
  }
  if (isSelect && criterion.options && criterion.acceptableOptions) {
    const offered = new Set(criterion.options);
    const unknown = criterion.acceptableOptions.filter(
      (option) => !offered.has(option),
    );
    if (unknown.length > 0) {
      throw new BadRequestException(
        `Acceptable options not offered by the criterion: ${unknown.join(', ')}`,
      );
    }
  }
}
