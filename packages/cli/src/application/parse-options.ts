import { InvalidArgumentError } from "commander";

export const parseNonNegativeInteger = (value: string): number => {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("expected a non-negative integer");
  }

  return Number.parseInt(value, 10);
};

export const parsePositiveInteger = (value: string): number => {
  const parsed = parseNonNegativeInteger(value);
  if (parsed === 0) {
    throw new InvalidArgumentError("expected a positive integer");
  }

  return parsed;
};

export const collectRepeatable = (value: string, previous: readonly string[] = []): string[] => [
  ...previous,
  value,
];
