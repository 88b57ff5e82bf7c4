/**
 * Stream decoder: applies the /Filter chain of a stream dictionary, with the
 * matching /DecodeParms for each stage.
 */

import type { PdfDict, PdfObject } from '../parser/types.js';
import { dictGet, dictGetNumber, isArray, isName, isDict } from '../parser/types.js';
import { StructuralError } from '../errors.js';
import {
  flateDecode, asciiHexDecode, ascii85Decode, lzwDecode, runLengthDecode, applyPngPredictor,
} from './filters.js';

type ResolveFn = (obj: PdfObject) => PdfObject;

const identity: ResolveFn = (obj) => obj;

export function decodeStream(data: Uint8Array, dict: PdfDict, resolve: ResolveFn = identity): Uint8Array {
  const filterObj = dictGet(dict, 'Filter');
  if (!filterObj) return data;

  const filter = resolve(filterObj);
  const parmsObj = dictGet(dict, 'DecodeParms');
  const parms = parmsObj ? resolve(parmsObj) : undefined;

  if (isName(filter)) {
    return applyFilter(data, filter.value, parms && isDict(parms) ? parms : undefined);
  }
  if (!isArray(filter)) return data;

  let result = data;
  filter.items.forEach((item, i) => {
    const name = resolve(item);
    if (!isName(name)) return;
    let stageParms: PdfObject | undefined;
    if (parms && isArray(parms)) {
      stageParms = parms.items[i] ? resolve(parms.items[i]) : undefined;
    } else {
      stageParms = parms;
    }
    result = applyFilter(result, name.value, stageParms && isDict(stageParms) ? stageParms : undefined);
  });
  return result;
}

function applyFilter(data: Uint8Array, filterName: string, parms?: PdfDict): Uint8Array {
  let decoded: Uint8Array;

  switch (filterName) {
    case 'FlateDecode':
    case 'Fl':
      decoded = flateDecode(data);
      break;
    case 'LZWDecode':
    case 'LZW':
      decoded = lzwDecode(data, parms ? (dictGetNumber(parms, 'EarlyChange') ?? 1) : 1);
      break;
    case 'ASCIIHexDecode':
    case 'AHx':
      return asciiHexDecode(data);
    case 'ASCII85Decode':
    case 'A85':
      return ascii85Decode(data);
    case 'RunLengthDecode':
    case 'RL':
      return runLengthDecode(data);
    default:
      throw new StructuralError(`Unsupported filter for structural stream: /${filterName}`);
  }

  const predictor = parms ? (dictGetNumber(parms, 'Predictor') ?? 1) : 1;
  if (parms && predictor >= 10) {
    return applyPngPredictor(
      decoded,
      dictGetNumber(parms, 'Columns') ?? 1,
      dictGetNumber(parms, 'Colors') ?? 1,
      dictGetNumber(parms, 'BitsPerComponent') ?? 8,
    );
  }
  return decoded;
}
