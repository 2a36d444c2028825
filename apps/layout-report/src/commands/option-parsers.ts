import { InvalidArgumentError } from "commander";

export const parsePixels = (value: string): number => {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return Number(value.trim());
};

/**
 * Collects `id=count` pairs passed to a variadic option.
 */
export const parseItemCount = (
  value: string,
  previous: Record<string, number> = {},
): Record<string, number> => {
  const match = /^([^=]+)=(\d+)$/.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError(`Expected <widgetId>=<count>, got "${value}".`);
  }
  const [, widgetId = "", count = "0"] = match;
  return { ...previous, [widgetId]: Number(count) };
};
