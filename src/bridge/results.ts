// Result records returned across the boundary by the Computation Layer.
// Constructors take every field and freeze the record, so a partially
// initialised result is never observable.

export type BmiCategory = "underweight" | "normal" | "overweight";

/** Wire codes stored in PersonInfo.bmi_category. */
export const BMI_CATEGORY_CODES: Readonly<Record<BmiCategory, number>> = {
  underweight: 0,
  normal: 1,
  overweight: 2,
};

export function bmiCategoryFromCode(code: number): BmiCategory | null {
  switch (code) {
    case 0: return "underweight";
    case 1: return "normal";
    case 2: return "overweight";
    default: return null;
  }
}

export interface PersonInfo {
  readonly isAdult: boolean;
  readonly bmiCategory: BmiCategory;
  readonly nameLength: number;
  readonly city: string;
}

export interface HealthAnalysis {
  readonly bmi: number;
  readonly riskScore: number;
  readonly recommendation: string;
  readonly cityRiskFactor: number;
}

export function createPersonInfo(fields: PersonInfo): PersonInfo {
  return Object.freeze({
    isAdult: fields.isAdult,
    bmiCategory: fields.bmiCategory,
    nameLength: fields.nameLength,
    city: fields.city,
  });
}

export function createHealthAnalysis(fields: HealthAnalysis): HealthAnalysis {
  return Object.freeze({
    bmi: fields.bmi,
    riskScore: fields.riskScore,
    recommendation: fields.recommendation,
    cityRiskFactor: fields.cityRiskFactor,
  });
}
