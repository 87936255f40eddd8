/**
 * Non-fatal conditions reported while building a figure.
 * geofacet() keeps going after each of these.
 */

export interface ExtraRegionsWarning {
  kind: 'ExtraRegions';
  /** Data regions not in the grid, in data spelling */
  regions: readonly string[];
  message: string;
}

export interface RenderFailureWarning {
  kind: 'RenderFailure';
  region: string;
  cause: unknown;
  message: string;
}

export interface NoLabeledPlotsWarning {
  kind: 'NoLabeledPlots';
  message: string;
}

export type FacetWarning = ExtraRegionsWarning | RenderFailureWarning | NoLabeledPlotsWarning;

export type WarningHandler = (warning: FacetWarning) => void;

export const defaultWarningHandler: WarningHandler = warning => {
  console.warn(warning.message);
};

export function extraRegionsWarning(regions: readonly string[]): ExtraRegionsWarning {
  return {
    kind: 'ExtraRegions',
    regions: [...regions],
    message: `Data contains regions not in grid (ignored): ${regions.join(', ')}`,
  };
}

export function renderFailureWarning(region: string, cause: unknown): RenderFailureWarning {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return {
    kind: 'RenderFailure',
    region,
    cause,
    message: `Error plotting region ${region}: ${reason}`,
  };
}

export function noLabeledPlotsWarning(): NoLabeledPlotsWarning {
  return {
    kind: 'NoLabeledPlots',
    message: 'Legend requested but no labeled plots found',
  };
}
