/** Touchdown quality tier */
export type LandingRatingLabel = 'Perfect' | 'Good' | 'Acceptable' | 'Hard' | 'Very Hard';

export interface LandingRating {
  label: LandingRatingLabel;
  /** 1 (very hard) to 5 (perfect) */
  score: number;
}

/** Raw low-altitude sample captured while airborne */
export interface ApproachSample {
  /** epoch ms */
  timestamp: number;
  altitudeAgl: number;
  lat: number;
  lon: number;
  verticalSpeed: number;
  groundSpeed: number;
}

/** One glide-path point relative to the touchdown */
export interface ApproachPoint {
  /** 0 at touchdown, negative before it */
  secondsBeforeTouchdown: number;
  altitudeAgl: number;
  /** NM */
  distanceToTouchdown: number;
  verticalSpeed: number;
  groundSpeed: number;
}

/** Accepted landing, broadcast to every viewer */
export interface LandingEvent {
  /** ISO 8601 touchdown time */
  timestamp: string;

  verticalSpeed: number;
  gForce: number;
  groundSpeed: number;

  rating: LandingRatingLabel;
  ratingScore: number;

  aircraftTitle: string | null;
  airport: string | null;

  pitch: number;
  bank: number;
  angleOfAttack: number;
  sideslip: number;
  headingMagnetic: number;
  lateralG: number;
  longitudinalG: number;

  /** Oldest first */
  approachData: ApproachPoint[];

  origin: string | null;
  destination: string | null;
  flightDurationSeconds: number;
  distanceNm: number;
}

/** Summary of one completed flight, handed to the flight store */
export interface FlightRecord {
  userId: string | null;
  sessionCode: string | null;
  origin: string | null;
  destination: string | null;
  aircraftType: string | null;
  /** ISO 8601 */
  departureTime: string;
  /** ISO 8601 */
  arrivalTime: string;
  flightDurationSeconds: number;
  distanceNm: number;
  maxAltitudeFt: number;
  landingRating: number;
  landingVs: number;
  landingGforce: number;
  score: number;
}

/** Origin/destination pair shared between viewers */
export interface RouteSpec {
  origin: string | null;
  destination: string | null;
}

export interface AirportCoords {
  lat: number;
  lon: number;
}
