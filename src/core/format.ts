const FORMAT_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];
const BYTES_PER_MB = 1024 * 1024;

export const human = (bytes: number | null | undefined): string => {
	if (bytes === 0) return '0 B';
	if (typeof bytes !== 'number' || !Number.isFinite(bytes) || bytes < 0) {
		return '-';
	}

	const unitIndex = Math.min(
		Math.floor(Math.log(bytes) / Math.log(1024)),
		FORMAT_UNITS.length - 1,
	);
	const value = bytes / 1024 ** unitIndex;
	const decimals = value >= 10 || unitIndex === 0 ? 0 : 1;

	return `${value.toFixed(decimals)} ${FORMAT_UNITS[unitIndex]}`;
};

export const toMegabytes = (bytes: number): number => bytes / BYTES_PER_MB;

export const fromMegabytes = (megabytes: number): number =>
	megabytes * BYTES_PER_MB;

export const roundTo = (value: number, decimals = 2): number => {
	const factor = 10 ** decimals;
	return Math.round(value * factor) / factor;
};

export const formatMegabytes = (megabytes: number): string =>
	`${megabytes.toFixed(2)} MB`;
