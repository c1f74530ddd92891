import assert from "node:assert/strict";
import test from "node:test";

import {
  detectLightningApproach,
  detectMarineConditions,
  detectRegionalWind,
  detectThermalGradient,
  formatOneDecimal,
  scoreStationConditions
} from "../../src/modules/alert-scoring/detectors.js";
import {
  TEST_GROUPS,
  TEST_NOW,
  TEST_THRESHOLDS,
  boraReadings,
  lightningEvent,
  marineReading,
  minutesBefore,
  stationReading
} from "../support/readings.js";

test("detects the regional wind pattern from reference and local pressure", () => {
  const verdict = detectRegionalWind(boraReadings(), TEST_GROUPS, TEST_THRESHOLDS);

  assert.equal(verdict.detected, true);
  assert.equal(
    verdict.explanation,
    "BORA PATTERN DETECTED: Pressure diff 15.0hPa, NE winds 50.0km/h"
  );
  assert.equal(verdict.pressureDiff, 15);
  assert.equal(verdict.maxReferenceWind, 50);
  assert.deepEqual(verdict.referenceStations, ["Trieste"]);
});

test("regional wind needs a reference station blowing out of the NE quadrant", () => {
  const readings = [
    stationReading({ stationId: "Trieste", pressure: 1030, windSpeed: 50, windDirection: 200 }),
    stationReading({ stationId: "Ancona", pressure: 1015 })
  ];

  const verdict = detectRegionalWind(readings, TEST_GROUPS, TEST_THRESHOLDS);

  assert.equal(verdict.detected, false);
  assert.equal(verdict.explanation, "");
});

test("the directional gate and the strongest wind may come from different stations", () => {
  const readings = [
    stationReading({ stationId: "Trieste", pressure: 1030, windSpeed: 45, windDirection: 200 }),
    stationReading({ stationId: "Rijeka", pressure: 1030, windSpeed: 35, windDirection: 30 }),
    stationReading({ stationId: "Ancona", pressure: 1015 })
  ];

  const verdict = detectRegionalWind(readings, TEST_GROUPS, TEST_THRESHOLDS);

  assert.equal(verdict.detected, true);
  assert.equal(
    verdict.explanation,
    "BORA PATTERN DETECTED: Pressure diff 15.0hPa, NE winds 45.0km/h"
  );
  assert.deepEqual(verdict.referenceStations, ["Trieste", "Rijeka"]);
});

test("regional wind thresholds are strict", () => {
  const readings = [
    stationReading({ stationId: "Trieste", pressure: 1025, windSpeed: 50, windDirection: 45 }),
    stationReading({ stationId: "Ancona", pressure: 1015 })
  ];

  assert.equal(detectRegionalWind(readings, TEST_GROUPS, TEST_THRESHOLDS).detected, false);
});

test("regional wind is not detected without readings from both groups", () => {
  const onlyReference = [
    stationReading({ stationId: "Trieste", pressure: 1040, windSpeed: 60, windDirection: 45 })
  ];

  const verdict = detectRegionalWind(onlyReference, TEST_GROUPS, TEST_THRESHOLDS);

  assert.deepEqual(verdict, { detected: false, explanation: "", referenceStations: [] });
});

test("flags short wave periods and high waves per marine point", () => {
  const verdict = detectMarineConditions(
    [
      marineReading({ pointId: "Ancona_Bay", wavePeriod: 3.5, waveHeight: 2.5 }),
      marineReading({ pointId: "Falconara_Offshore", wavePeriod: 6, waveHeight: 2.2 }),
      marineReading({ pointId: "Rimini_Offshore", wavePeriod: 4, waveHeight: 2 })
    ],
    TEST_THRESHOLDS
  );

  assert.equal(verdict.detected, true);
  assert.equal(
    verdict.explanation,
    "Ancona_Bay: Short wave period 3.5s; Ancona_Bay: High waves 2.5m; Falconara_Offshore: High waves 2.2m"
  );
  assert.deepEqual(verdict.flaggedPoints, ["Ancona_Bay", "Falconara_Offshore"]);
});

test("an exact half-tenth wave height rounds to the even digit", () => {
  const verdict = detectMarineConditions(
    [marineReading({ pointId: "Ancona_Bay", waveHeight: 2.25 })],
    TEST_THRESHOLDS
  );

  assert.equal(verdict.explanation, "Ancona_Bay: High waves 2.2m");
});

test("formatOneDecimal sends exact ties to the even digit", () => {
  assert.equal(formatOneDecimal(2.25), "2.2");
  assert.equal(formatOneDecimal(0.75), "0.8");
  assert.equal(formatOneDecimal(-2.25), "-2.2");
  assert.equal(formatOneDecimal(2.35), "2.4");
  assert.equal(formatOneDecimal(15), "15.0");
  assert.equal(formatOneDecimal(2.5), "2.5");
});

test("calm sea produces no marine verdict", () => {
  const verdict = detectMarineConditions([marineReading()], TEST_THRESHOLDS);

  assert.deepEqual(verdict, { detected: false, explanation: "", flaggedPoints: [] });
});

test("detects approaching lightning above the density threshold", () => {
  const events = Array.from({ length: 11 }, () => lightningEvent({ distanceKm: 40 }));

  const verdict = detectLightningApproach(events, TEST_THRESHOLDS, TEST_NOW);

  assert.equal(verdict.detected, true);
  assert.equal(verdict.explanation, "Lightning approaching: 11 strikes, avg distance 40.0km");
  assert.equal(verdict.strikeCount, 11);
});

test("ignores strikes that are stale, distant or at the density threshold", () => {
  const events = [
    ...Array.from({ length: 10 }, () => lightningEvent()),
    lightningEvent({ timestamp: minutesBefore(TEST_NOW, 10) }),
    lightningEvent({ distanceKm: 100 })
  ];

  const verdict = detectLightningApproach(events, TEST_THRESHOLDS, TEST_NOW);

  assert.equal(verdict.detected, false);
  assert.equal(verdict.strikeCount, 10);
});

test("measures the thermal gradient between coastal and inland stations", () => {
  const verdict = detectThermalGradient(
    [
      stationReading({ stationId: "Ancona", temperature: 15 }),
      stationReading({ stationId: "Bologna", temperature: 25, terrain: "inland" }),
      stationReading({ stationId: "Gubbio", temperature: 40, terrain: "mountain" })
    ],
    TEST_THRESHOLDS
  );

  assert.equal(verdict.detected, true);
  assert.equal(
    verdict.explanation,
    "High thermal gradient: 10.0°C difference (Inland: 25.0°C, Coastal: 15.0°C)"
  );
  assert.deepEqual(verdict.inlandStations, ["Bologna"]);
});

test("a gradient at the threshold is not detected", () => {
  const verdict = detectThermalGradient(
    [
      stationReading({ temperature: 12 }),
      stationReading({ stationId: "Foligno", temperature: 20, terrain: "inland" })
    ],
    TEST_THRESHOLDS
  );

  assert.equal(verdict.detected, false);
  assert.equal(verdict.gradient, 8);
});

test("sums generic station points without a cap", () => {
  const stormy = stationReading({ windSpeed: 40, condition: "Thunderstorm", humidity: 90 });
  const rainy = stationReading({ stationId: "Fano", condition: "Rain" });
  const calm = stationReading({ stationId: "Pesaro", windSpeed: 35, humidity: 85 });

  assert.equal(scoreStationConditions([stormy, rainy, calm], TEST_THRESHOLDS), 45);
});
