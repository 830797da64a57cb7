import { Transform } from 'class-transformer';
import { normalizeGradeTier, normalizeProficiencyLevel } from '../grade-tiers';

/** Accepts labels like `middle_school_2` or `初中`; unknown labels pass through for `@IsIn` to reject. */
export const ToGradeTier = () =>
  Transform(({ value }) => (typeof value === 'string' ? normalizeGradeTier(value) ?? value : value));

export const ToProficiencyLevel = () =>
  Transform(({ value }) =>
    typeof value === 'string' ? normalizeProficiencyLevel(value) ?? value : value,
  );
