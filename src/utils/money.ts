// Prices are stored in major units (e.g. 25.5) but summed in minor units
// (paise/cents) so totals do not drift.

export const toMinorUnits = (amount: number): number => Math.round(amount * 100);

export const fromMinorUnits = (minor: number): number => minor / 100;

export const roundToMinorUnits = (amount: number): number =>
  fromMinorUnits(toMinorUnits(amount));

export const lineTotal = (price: number, quantity: number): number =>
  fromMinorUnits(toMinorUnits(price) * quantity);

export const sumLines = (
  lines: ReadonlyArray<{ price: number; quantity: number }>
): number =>
  fromMinorUnits(
    lines.reduce((sum, line) => sum + toMinorUnits(line.price) * line.quantity, 0)
  );
