export interface CreateMatchRequestInput {
  externalEventId: number;
  eventKey: string;
  selfiePath: string;
}

export interface MatchRequestCorrelation {
  requestId: number;
  requestKey: string;
  redirectUrl: string | null;
}

export interface MatchedImagesQuery {
  externalEventId: number;
  eventKey: string;
  requestId: number;
  requestKey: string;
  // zero-based
  page: number;
  // -1 asks the provider for every image
  pageSize: number;
}

export interface ProviderImage {
  id: number;
  name: string;
  imageUrl: string | null;
  width: number | null;
  height: number | null;
  size: number | null;
}
