export type VariationDomain =
  | { kind: 'finite'; values: readonly string[] }
  | { kind: 'symbolic'; description?: string };

export type VariationDeclaration = {
  id: string;
  domain: VariationDomain;
  default?: string;
  /** Planning choice made by the author ahead of playback. */
  pinned?: string;
};

export type ResolutionSource = 'pinned' | 'default' | 'sampled';

export type VariationResolution = {
  variationId: string;
  value: string;
  source: ResolutionSource;
  /** Instance whose entry triggered the resolution, when known. */
  resolvedBy?: string;
  /** Position in the session's resolution order. */
  sequence: number;
};

export type VariationReference = {
  variationId: string;
  segmentId: string;
};

export type VariationLookup = (variationId: string) => string | undefined;
