/**
 * Equated monthly instalment for a principal at an annual rate (percent)
 * over `tenureMonths`, rounded to paise. A zero rate splits the principal evenly.
 */
export function calculateEmi(principal: number, annualRate: number, tenureMonths: number): number {
  if (annualRate === 0) {
    return principal / tenureMonths;
  }
  const monthlyRate = annualRate / (12 * 100);
  const growth = Math.pow(1 + monthlyRate, tenureMonths);
  const emi = (principal * monthlyRate * growth) / (growth - 1);
  return Math.round(emi * 100) / 100;
}

/**
 * Largest principal whose EMI does not exceed `maxEmi`, rounded to the rupee.
 */
export function calculateMaxLoanForEmi(maxEmi: number, annualRate: number, tenureMonths: number): number {
  if (annualRate === 0) {
    return maxEmi * tenureMonths;
  }
  const monthlyRate = annualRate / (12 * 100);
  const growth = Math.pow(1 + monthlyRate, tenureMonths);
  return Math.round((maxEmi * (growth - 1)) / (monthlyRate * growth));
}
