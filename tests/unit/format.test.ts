import {expect, test} from 'vitest';
import {
	formatMegabytes,
	fromMegabytes,
	human,
	roundTo,
	toMegabytes,
} from '../../src/core/format.js';

test('human formats byte counts with binary units', () => {
	expect(human(0)).toBe('0 B');
	expect(human(512)).toBe('512 B');
	expect(human(1024)).toBe('1.0 KB');
	expect(human(5 * 1024 * 1024)).toBe('5.0 MB');
	expect(human(150 * 1024 * 1024)).toBe('150 MB');
	expect(human(undefined)).toBe('-');
	expect(human(-1)).toBe('-');
});

test('megabyte helpers convert and round', () => {
	expect(toMegabytes(5 * 1024 * 1024)).toBe(5);
	expect(fromMegabytes(1.5)).toBe(1_572_864);
	expect(roundTo(2.345_678)).toBe(2.35);
	expect(roundTo(2.345_678, 0)).toBe(2);
	expect(formatMegabytes(5)).toBe('5.00 MB');
	expect(formatMegabytes(0.125)).toBe('0.13 MB');
});
