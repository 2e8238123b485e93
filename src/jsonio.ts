// JSON listing of a decoded PAK, for inspecting archives

import type { CodecRegistry, ConvertedResource, PakJson, StrgJson } from './types.js';
import type { Pak } from './pak.js';
import { Strg } from './strg.js';
import { RawAsset, defaultCodecs, resolveCodec } from './codecs.js';
import { toHex } from './textio.js';

export interface PakJsonOptions {
  registry?: CodecRegistry;
  quiet?: boolean;
}

export function strgToJson(strg: Strg): StrgJson {
  const names: Record<string, number> = {};
  strg.nameTable.names.forEach((name, i) => {
    names[name] = strg.nameTable.entries[i].stringIndex;
  });

  const languages: Record<string, string[]> = {};
  strg.languages.forEach((language, i) => {
    languages[language.languageId] = [...strg.stringTables[i].strings];
  });

  return { magic: strg.magic, version: strg.version, names, languages };
}

export function pakToJsonObject(pak: Pak, options: PakJsonOptions = {}): PakJson {
  const registry = options.registry ?? defaultCodecs;
  const quiet = options.quiet ?? true;

  const resources = pak.resources.map((resource, index) => {
    const entry = pak.resourceEntries[index];
    const assetId = `0x${entry.assetId.toString(16).toUpperCase().padStart(8, '0')}`;
    const named = pak.namedResources.find(candidate => candidate.assetId === entry.assetId);

    if (!quiet) {
      console.log(`${entry.assetType.padEnd(4)} ${assetId} ${entry.size.toString().padStart(8)}  ${named?.name ?? ''}`);
    }

    const wrapper: ConvertedResource = {
      assetType: entry.assetType,
      assetId,
      size: entry.size,
      offset: entry.offset,
      codec: entry.compressed ? 'fallback' : resolveCodec(registry, entry.assetType, entry.assetId).kind
    };

    if (entry.compressed) {
      wrapper.compressed = true;
    }

    if (named) {
      wrapper.name = named.name;
    }

    if (resource instanceof Strg) {
      wrapper.obj = strgToJson(resource);
    } else if (resource instanceof RawAsset) {
      wrapper.data = toHex(resource.data);
    } else {
      wrapper.data = toHex(resource.encode());
    }

    return wrapper;
  });

  return {
    _metadata: {
      majorVersion: pak.majorVersion,
      minorVersion: pak.minorVersion,
      unused: pak.unused
    },
    resources
  };
}

export function pakToJson(pak: Pak, options: PakJsonOptions = {}): string {
  return JSON.stringify(pakToJsonObject(pak, options), null, '\t');
}
