import { Row } from "../csv/row-stream";

const integerLiteral = /^\s*[+-]?\d+\s*$/;
const floatLiteral = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

// toFixed takes at most 100 digits, and writes 1e21 and above in exponent form.
const MaxDigits = 100;
const ExponentFormFrom = 1e21;

/**
 * Round a non-negative value to `precision` digits, half to even.
 * toFixed breaks exact ties away from zero, so ties are detected from the
 * exact decimal expansion and resolved on the last kept digit.
 */
function roundHalfEven(magnitude: number, precision: number): string {
    const rounded = magnitude.toFixed(precision);
    if (precision >= MaxDigits) {
        return rounded;
    }
    const [whole, fraction] = magnitude.toFixed(MaxDigits).split('.');
    const isTie = fraction[precision] === '5' && /^0*$/.test(fraction.slice(precision + 1));
    if (!isTie) {
        return rounded;
    }
    const kept = precision > 0 ? `${whole}.${fraction.slice(0, precision)}` : whole;
    const lastDigit = Number(kept[kept.length - 1]);
    return lastDigit % 2 === 0 ? kept : rounded;
}

/**
 * Shortest decimal form of a float, always with a fractional part: 7 becomes "7.0".
 */
function formatFloat(value: number): string {
    if (Object.is(value, -0)) {
        return '-0.0';
    }
    const text = String(value);
    return /^-?\d+$/.test(text) ? `${text}.0` : text;
}

/**
 * Round a cell holding a decimal number to the given number of digits.
 * Integer literals and non-numeric text are returned unchanged.
 */
export function roundCell(cell: string, precision: number): string {
    if (integerLiteral.test(cell) || !floatLiteral.test(cell)) {
        return cell;
    }
    const value = Number(cell);
    if (!Number.isFinite(value)) {
        return cell;
    }
    const magnitude = Math.abs(value);
    if (magnitude >= ExponentFormFrom) {
        return formatFloat(value);
    }
    const negative = value < 0 || Object.is(value, -0);
    const rounded = Number(roundHalfEven(magnitude, precision));
    return formatFloat(negative ? -rounded : rounded);
}

export function roundRow(row: Row, precision: number): Row {
    return row.map(cell => roundCell(cell, precision));
}
