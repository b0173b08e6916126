import { Decimal } from 'decimal.js';

// Money never goes through binary floating point. 29 significant digits keeps
// sums of spreadsheet amounts exact well past any realistic portfolio size.
Decimal.set({ precision: 29, rounding: Decimal.ROUND_HALF_UP });

export { Decimal };
