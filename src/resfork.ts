// Apple IIgs resource fork parsing

import { StructTemplateParser } from './structtemplate.js';
import { MalformedHeaderError, TooShortError } from './errors.js';
import { hexWord } from './textio.js';

export const RESOURCE_FORK_HEADER_SIZE = 140;

const forkHeader = StructTemplateParser.fromTemplateString('I I I:version,mapOffset,mapSize');

const mapHeader = StructTemplateParser.fromTemplateString(
  'I H I I H H H I I H H:next,flags,offset,size,toIndex,fileNumber,id,indexSize,indexUsed,freeListSize,freeListUsed'
);

const referenceRecord = StructTemplateParser.fromTemplateString('H I I H I I+:type,id,offset,attributes,size,handle');

export interface IIgsResource {
  type: number;
  id: number;
  attributes: number;
  data: Uint8Array;
}

export interface IIgsResourceFork {
  // Keyed by resource type, then by resource id
  resources: Map<number, Map<number, IIgsResource>>;
  // Index entries whose data lies outside the fork
  skipped: string[];
}

export class IIgsResourceForkParser {
  static fromBytes(data: Uint8Array): IIgsResourceFork {
    if (data.length < RESOURCE_FORK_HEADER_SIZE) {
      throw new TooShortError(`resource fork of ${data.length} bytes is smaller than its ${RESOURCE_FORK_HEADER_SIZE}-byte header`);
    }

    const header = StructTemplateParser.unpackRecord(data, 0, forkHeader);
    const mapOffset = header.num('mapOffset');
    if (header.num('version') !== 0 || mapOffset + mapHeader.recordLength > data.length) {
      throw new MalformedHeaderError(`resource map offset ${mapOffset} does not fit a ${data.length}-byte fork`);
    }

    const map = StructTemplateParser.unpackRecord(data, mapOffset, mapHeader);
    const indexStart = mapOffset + map.num('toIndex');
    const indexSize = map.num('indexSize');
    if (indexStart + indexSize * referenceRecord.recordLength > data.length) {
      throw new MalformedHeaderError(`resource index of ${indexSize} entries runs off the end of the fork`);
    }

    const fork: IIgsResourceFork = { resources: new Map(), skipped: [] };
    for (const ref of StructTemplateParser.unpackList(data, indexStart, indexSize, referenceRecord)) {
      const type = ref.num('type');
      // A zero type ends the used part of the index
      if (type === 0) {
        break;
      }

      const id = ref.num('id');
      const offset = ref.num('offset');
      const size = ref.num('size');
      if (offset + size > data.length) {
        fork.skipped.push(`resource $${hexWord(type)}:${id} data runs off the end of the fork`);
        continue;
      }

      let typeResources = fork.resources.get(type);
      if (!typeResources) {
        typeResources = new Map();
        fork.resources.set(type, typeResources);
      }
      typeResources.set(id, { type, id, attributes: ref.num('attributes'), data: data.subarray(offset, offset + size) });
    }

    return fork;
  }
}

export function findResource(fork: IIgsResourceFork, type: number, id?: number): IIgsResource | undefined {
  const typeResources = fork.resources.get(type);
  if (!typeResources) {
    return undefined;
  }
  if (id !== undefined) {
    return typeResources.get(id);
  }
  // Lowest id when none is asked for
  const ids = [...typeResources.keys()].sort((a, b) => a - b);
  return ids.length > 0 ? typeResources.get(ids[0]) : undefined;
}
