/**
 * assetsSummary aggregation over the live assets of a version
 */

import { z } from "zod";
import type { LiveAsset } from "../types.ts";

export type NamedItem = {
  name: string;
  identifier?: string;
  schemaKey?: string;
};

export type AssetsSummary = {
  schemaKey: "AssetsSummary";
  numberOfBytes: number;
  numberOfFiles: number;
  dataStandard: NamedItem[];
  approach: NamedItem[];
  measurementTechnique: NamedItem[];
  variableMeasured: string[];
  species: NamedItem[];
};

const NWB_STANDARD: NamedItem = {
  schemaKey: "StandardsType",
  name: "Neurodata Without Borders (NWB)",
  identifier: "RRID:SCR_015242",
};

const BIDS_STANDARD: NamedItem = {
  schemaKey: "StandardsType",
  name: "Brain Imaging Data Structure (BIDS)",
  identifier: "RRID:SCR_016124",
};

const OME_NGFF_STANDARD: NamedItem = {
  schemaKey: "StandardsType",
  name: "OME/NGFF Standard",
  identifier: "DOI:10.25504/FAIRsharing.9af712",
};

const NamedItemInput = z.object({
  name: z.string(),
  identifier: z.string().optional(),
  schemaKey: z.string().optional(),
});

const VariableInput = z.union([z.string(), z.object({ value: z.string() })]);

const ParticipantInput = z.object({ species: z.unknown().optional() });

/** Elements of `value` that parse; anything else is skipped */
const parseEach = <T>(value: unknown, schema: z.ZodType<T>): T[] => {
  if (!Array.isArray(value)) return [];
  const result: T[] = [];
  for (const entry of value) {
    const parsed = schema.safeParse(entry);
    if (parsed.success) result.push(parsed.data);
  }
  return result;
};

/**
 * Insertion-ordered set of named items, unique by identifier or name
 */
const createNamedSet = () => {
  const items = new Map<string, NamedItem>();
  return {
    add: (item: NamedItem) => {
      const key = item.identifier ?? item.name;
      if (!items.has(key)) items.set(key, { ...item });
    },
    values: () => [...items.values()],
  };
};

const standardsOf = ({ asset }: LiveAsset): NamedItem[] => {
  const result: NamedItem[] = [];
  const encodingFormat = asset.metadata.encodingFormat;
  const fileName = asset.path.slice(asset.path.lastIndexOf("/") + 1);
  if (encodingFormat === "application/x-nwb" || asset.path.endsWith(".nwb")) {
    result.push(NWB_STANDARD);
  }
  if (fileName === "dataset_description.json") result.push(BIDS_STANDARD);
  if (asset.path.endsWith(".ome.zarr") || encodingFormat === "application/x-ome-zarr") {
    result.push(OME_NGFF_STANDARD);
  }
  return result;
};

/**
 * Compute the summary of a version from its live assets (any order;
 * list entries follow the order given).
 */
export const summarizeAssets = (assets: Iterable<LiveAsset>): AssetsSummary => {
  let numberOfBytes = 0;
  let numberOfFiles = 0;
  const dataStandard = createNamedSet();
  const approach = createNamedSet();
  const measurementTechnique = createNamedSet();
  const species = createNamedSet();
  const variableMeasured = new Set<string>();

  for (const live of assets) {
    const { metadata } = live.asset;
    numberOfBytes += live.size;
    numberOfFiles += 1;

    for (const standard of standardsOf(live)) dataStandard.add(standard);
    for (const item of parseEach(metadata.approach, NamedItemInput)) approach.add(item);
    for (const item of parseEach(metadata.measurementTechnique, NamedItemInput)) {
      measurementTechnique.add(item);
    }
    for (const variable of parseEach(metadata.variableMeasured, VariableInput)) {
      variableMeasured.add(typeof variable === "string" ? variable : variable.value);
    }
    for (const participant of parseEach(metadata.wasAttributedTo, ParticipantInput)) {
      const parsed = NamedItemInput.safeParse(participant.species);
      if (parsed.success) species.add(parsed.data);
    }
  }

  return {
    schemaKey: "AssetsSummary",
    numberOfBytes,
    numberOfFiles,
    dataStandard: dataStandard.values(),
    approach: approach.values(),
    measurementTechnique: measurementTechnique.values(),
    variableMeasured: [...variableMeasured],
    species: species.values(),
  };
};
