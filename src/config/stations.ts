import type { MarinePoint, WeatherStation } from "../modules/readings/types.js";

export const TARGET_LOCATION = Object.freeze({
  name: "Falconara Marittima",
  latitude: 43.6167,
  longitude: 13.4
});

export const WEATHER_STATIONS: readonly WeatherStation[] = [
  // Bora detection: upwind of a northeasterly outbreak
  { id: "Trieste", latitude: 45.6469, longitude: 13.778, distanceKm: 150, bearing: "NE", priority: 1, terrain: "coastal" },
  { id: "Nova_Gorica", latitude: 45.9564, longitude: 13.6581, distanceKm: 140, bearing: "NE", priority: 1, terrain: "mountain" },
  { id: "Rijeka", latitude: 45.3431, longitude: 14.4078, distanceKm: 180, bearing: "NE", priority: 1, terrain: "coastal" },
  // Apennine storm formation
  { id: "Gubbio", latitude: 43.3506, longitude: 12.5781, distanceKm: 60, bearing: "SW", priority: 1, terrain: "mountain" },
  { id: "Foligno", latitude: 42.9563, longitude: 12.7033, distanceKm: 70, bearing: "SW", priority: 1, terrain: "inland" },
  { id: "Fabriano", latitude: 43.3359, longitude: 12.9044, distanceKm: 45, bearing: "W", priority: 1, terrain: "mountain" },
  // Coastal tracking
  { id: "Pesaro", latitude: 43.9073, longitude: 12.8946, distanceKm: 35, bearing: "N", priority: 2, terrain: "coastal" },
  { id: "Fano", latitude: 43.8433, longitude: 13.0172, distanceKm: 25, bearing: "NW", priority: 2, terrain: "coastal" },
  { id: "Ancona", latitude: 43.6167, longitude: 13.4, distanceKm: 5, bearing: "LOCAL", priority: 1, terrain: "coastal" },
  { id: "Macerata", latitude: 43.3007, longitude: 13.4527, distanceKm: 35, bearing: "S", priority: 2, terrain: "inland" },
  // Thermal gradient
  { id: "Rimini", latitude: 44.0527, longitude: 12.5664, distanceKm: 60, bearing: "N", priority: 3, terrain: "coastal" },
  { id: "Bologna", latitude: 44.4949, longitude: 11.3426, distanceKm: 120, bearing: "NW", priority: 3, terrain: "inland" }
];

export const MARINE_POINTS: readonly MarinePoint[] = [
  { id: "Falconara_Offshore", latitude: 43.7, longitude: 13.6 },
  { id: "Ancona_Bay", latitude: 43.6, longitude: 13.5 },
  { id: "Rimini_Offshore", latitude: 44.1, longitude: 12.8 }
];

export const STATION_GROUPS = Object.freeze({
  neReference: Object.freeze(["Trieste", "Nova_Gorica", "Rijeka"]),
  localTarget: Object.freeze(["Ancona", "Falconara"]),
  etaInland: Object.freeze(["Gubbio", "Fabriano"])
});

export const LIGHTNING_SEARCH_RADIUS_KM = 100;
