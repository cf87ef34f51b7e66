/**
 * Open Location Code ("plus code") encoder
 * https://github.com/google/open-location-code/blob/main/Documentation/Specification/specification.md
 */

const CODE_ALPHABET = '23456789CFGHJMPQRVWX';
const ENCODING_BASE = CODE_ALPHABET.length;
const SEPARATOR = '+';
const SEPARATOR_POSITION = 8;
const PADDING_CHARACTER = '0';
const LATITUDE_MAX = 90;
const LONGITUDE_MAX = 180;
const MIN_CODE_LENGTH = 2;
const MAX_CODE_LENGTH = 15;
const PAIR_CODE_LENGTH = 10;
const GRID_CODE_LENGTH = MAX_CODE_LENGTH - PAIR_CODE_LENGTH;
const GRID_COLUMNS = 4;
const GRID_ROWS = 5;
const PAIR_PRECISION = ENCODING_BASE ** 3;
const FINAL_LAT_PRECISION = PAIR_PRECISION * GRID_ROWS ** GRID_CODE_LENGTH;
const FINAL_LNG_PRECISION = PAIR_PRECISION * GRID_COLUMNS ** GRID_CODE_LENGTH;

export const DEFAULT_CODE_LENGTH = 10;

function latitudePrecision(codeLength: number): number {
  if (codeLength <= PAIR_CODE_LENGTH) {
    return ENCODING_BASE ** (Math.floor(codeLength / -2) + 2);
  }
  return ENCODING_BASE ** -3 / GRID_ROWS ** (codeLength - PAIR_CODE_LENGTH);
}

function normalizeLongitude(longitude: number): number {
  let lng = longitude;
  while (lng < -LONGITUDE_MAX) {
    lng += 360;
  }
  while (lng >= LONGITUDE_MAX) {
    lng -= 360;
  }
  return lng;
}

export function encodePlusCode(latitude: number, longitude: number, codeLength = DEFAULT_CODE_LENGTH): string {
  if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
    throw new RangeError('Plus code encoding needs finite coordinates');
  }
  if (codeLength < MIN_CODE_LENGTH || (codeLength < PAIR_CODE_LENGTH && codeLength % 2 === 1)) {
    throw new RangeError(`Invalid plus code length: ${codeLength}`);
  }

  const length = Math.min(codeLength, MAX_CODE_LENGTH);
  let lat = Math.min(Math.max(latitude, -LATITUDE_MAX), LATITUDE_MAX);
  if (lat === LATITUDE_MAX) {
    lat -= latitudePrecision(length);
  }
  const lng = normalizeLongitude(longitude);

  let latVal = Math.floor(Math.round((lat + LATITUDE_MAX) * FINAL_LAT_PRECISION * 1e6) / 1e6);
  let lngVal = Math.floor(Math.round((lng + LONGITUDE_MAX) * FINAL_LNG_PRECISION * 1e6) / 1e6);

  let code = '';
  if (length > PAIR_CODE_LENGTH) {
    for (let i = 0; i < GRID_CODE_LENGTH; i++) {
      const latDigit = latVal % GRID_ROWS;
      const lngDigit = lngVal % GRID_COLUMNS;
      code = CODE_ALPHABET[latDigit * GRID_COLUMNS + lngDigit] + code;
      latVal = Math.floor(latVal / GRID_ROWS);
      lngVal = Math.floor(lngVal / GRID_COLUMNS);
    }
  } else {
    latVal = Math.floor(latVal / GRID_ROWS ** GRID_CODE_LENGTH);
    lngVal = Math.floor(lngVal / GRID_COLUMNS ** GRID_CODE_LENGTH);
  }

  for (let i = 0; i < PAIR_CODE_LENGTH / 2; i++) {
    code = CODE_ALPHABET[lngVal % ENCODING_BASE] + code;
    code = CODE_ALPHABET[latVal % ENCODING_BASE] + code;
    latVal = Math.floor(latVal / ENCODING_BASE);
    lngVal = Math.floor(lngVal / ENCODING_BASE);
  }

  code = code.slice(0, SEPARATOR_POSITION) + SEPARATOR + code.slice(SEPARATOR_POSITION);

  if (length >= SEPARATOR_POSITION) {
    return code.slice(0, length + 1);
  }

  return code.slice(0, length) + PADDING_CHARACTER.repeat(SEPARATOR_POSITION - length) + SEPARATOR;
}
