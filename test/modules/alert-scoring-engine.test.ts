import assert from "node:assert/strict";
import test from "node:test";

import { AlertScoringEngine, estimateEta, renderReason } from "../../src/modules/alert-scoring/engine.js";
import {
  TEST_GROUPS,
  TEST_NOW,
  TEST_THRESHOLDS,
  boraReadings,
  lightningEvent,
  marineReading,
  stationReading
} from "../support/readings.js";

function createEngine(): AlertScoringEngine {
  return new AlertScoringEngine({
    thresholds: TEST_THRESHOLDS,
    stationGroups: TEST_GROUPS,
    clock: () => TEST_NOW
  });
}

const roughSea = () => [marineReading({ waveHeight: 2.5 })];
const strikes = () => Array.from({ length: 11 }, () => lightningEvent({ distanceKm: 20 }));
const thermalSplit = () => [
  stationReading({ stationId: "Ancona", temperature: 15 }),
  stationReading({ stationId: "Bologna", temperature: 25, terrain: "inland" })
];

test("a detected regional wind forces CRITICAL with the immediate ETA", () => {
  const outcome = createEngine().calculate(boraReadings(), [], []);

  assert.equal(outcome.score, 70);
  assert.equal(outcome.level, "CRITICAL");
  assert.equal(outcome.eta, "15-45 minutes (BORA - IMMEDIATE DANGER)");
  assert.equal(outcome.regionalWindDetected, true);
  assert.deepEqual(outcome.reasons.map(renderReason), [
    "🌪️ BORA: BORA PATTERN DETECTED: Pressure diff 15.0hPa, NE winds 50.0km/h"
  ]);
});

test("clamps the score at 100 when every detector fires", () => {
  const weather = [
    ...boraReadings(),
    stationReading({ stationId: "Bologna", temperature: 30, terrain: "inland" })
  ];

  const outcome = createEngine().calculate(weather, roughSea(), strikes());

  assert.equal(outcome.score, 100);
  assert.equal(outcome.level, "CRITICAL");
  assert.deepEqual(
    outcome.reasons.map((reason) => reason.category),
    ["REGIONAL_WIND", "MARINE", "LIGHTNING", "THERMAL"]
  );
});

test("marine conditions plus a stormy station give MEDIUM with the marine ETA", () => {
  const weather = [stationReading({ windSpeed: 40, condition: "Thunderstorm", humidity: 90 })];

  const outcome = createEngine().calculate(weather, roughSea(), []);

  assert.equal(outcome.score, 55);
  assert.equal(outcome.level, "MEDIUM");
  assert.equal(outcome.eta, "45-90 minutes");
  assert.deepEqual(outcome.reasons.map(renderReason), ["🌊 MARINE: Ancona_Bay: High waves 2.5m"]);
});

test("several rough marine points add the marine bonus once", () => {
  const outcome = createEngine().calculate(
    [],
    [
      marineReading({ pointId: "Ancona_Bay", waveHeight: 2.5 }),
      marineReading({ pointId: "Falconara_Offshore", wavePeriod: 3 })
    ],
    []
  );

  assert.equal(outcome.score, 25);
  assert.equal(outcome.reasons.length, 1);
  assert.equal(
    outcome.reasons[0]?.text,
    "Ancona_Bay: High waves 2.5m; Falconara_Offshore: Short wave period 3.0s"
  );
});

test("lightning takes ETA precedence over marine and thermal", () => {
  const weather = [
    stationReading({ stationId: "Ancona", temperature: 15, windSpeed: 40 }),
    stationReading({ stationId: "Bologna", temperature: 25, terrain: "inland" })
  ];

  const outcome = createEngine().calculate(weather, roughSea(), strikes());

  assert.equal(outcome.score, 80);
  assert.equal(outcome.level, "HIGH");
  assert.equal(outcome.eta, "30-60 minutes");
  assert.equal(outcome.regionalWindDetected, false);
  assert.deepEqual(outcome.reasons.map(renderReason), [
    "🌊 MARINE: Ancona_Bay: High waves 2.5m",
    "⚡ LIGHTNING: Lightning approaching: 11 strikes, avg distance 20.0km",
    "🌡️ THERMAL: High thermal gradient: 10.0°C difference (Inland: 25.0°C, Coastal: 15.0°C)"
  ]);
});

test("a score of exactly 70 without a regional wind stays MEDIUM", () => {
  const outcome = createEngine().calculate(thermalSplit(), roughSea(), strikes());

  assert.equal(outcome.score, 70);
  assert.equal(outcome.level, "MEDIUM");
});

test("a reason citing an inland ETA station selects the 1-2 hour bucket", () => {
  const weather = [
    stationReading({ stationId: "Ancona", temperature: 15 }),
    stationReading({ stationId: "Gubbio", temperature: 25, terrain: "inland" })
  ];

  const outcome = createEngine().calculate(weather, [], []);

  assert.equal(outcome.score, 15);
  assert.equal(outcome.level, "LOW");
  assert.equal(outcome.eta, "1-2 hours");
});

test("quiet conditions score zero with the default ETA", () => {
  const outcome = createEngine().calculate([stationReading()], [marineReading()], []);

  assert.deepEqual(outcome, {
    score: 0,
    reasons: [],
    level: "LOW",
    eta: "2-3 hours",
    regionalWindDetected: false
  });
  assert.deepEqual(createEngine().calculate([], [], []), outcome);
});

test("estimateEta matches categories and cited stations exactly", () => {
  const thermal = { category: "THERMAL", text: "Gubbio is mentioned here", stations: ["Bologna"] } as const;

  assert.equal(estimateEta([thermal], false, ["Gubbio"]), "2-3 hours");
  assert.equal(estimateEta([thermal], false, ["Bologna"]), "1-2 hours");
  assert.equal(estimateEta([thermal], true, []), "15-45 minutes (BORA - IMMEDIATE DANGER)");
  assert.equal(estimateEta([], false, ["Gubbio"]), "2-3 hours");
});
