export interface Point {
  x: number;
  y: number;
}

export interface Stroke {
  /** Server-assigned once persisted; 0 or absent on client-originated strokes. */
  id?: number;
  points: Point[];
  color: string;
  width: number;
  /** Client correlation id used to match a local stroke with its confirmed id. */
  clientId: string;
  startedAtUnixMs: number;
}

export interface StrokeEnvelope {
  type: 'stroke';
  stroke: Stroke;
}

export interface DeleteEnvelope {
  type: 'delete';
  delete: number;
}

export type Envelope = StrokeEnvelope | DeleteEnvelope;

export interface Candidate {
  text: string;
  score: number;
}

export interface RecognizeRequest {
  topN?: number;
  width?: number;
  height?: number;
}

export interface RecognizeResponse {
  candidates: Candidate[];
}

export interface UserView {
  id: number;
  email: string;
}

export interface AuthResponse extends UserView {
  token: string;
}
