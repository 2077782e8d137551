import { STATE_KEYS, type SessionStateMap } from "../../session/session.types";
import {
  TOOL_ERROR_KINDS,
  toolFailure,
  toolSuccess,
  type ToolArguments,
  type ToolDefinition,
  type ToolResult,
} from "./tool.types";

export type TemperatureUnit = "Celsius" | "Fahrenheit";

export interface CityWeather {
  readonly displayName: string;
  readonly condition: string;
  readonly temperatureC: number;
}

export const WEATHER_FIXTURES: Readonly<Record<string, CityWeather>> = Object.freeze({
  "new york": { displayName: "New York", condition: "sunny", temperatureC: 25 },
  london: { displayName: "London", condition: "cloudy", temperatureC: 15 },
  tokyo: { displayName: "Tokyo", condition: "light rain", temperatureC: 18 },
});

export const DEFAULT_TEMPERATURE_UNIT: TemperatureUnit = "Celsius";

export function normalizeCityName(raw: string): string {
  return raw.trim().replace(/\s+/g, " ").toLowerCase();
}

export function lookupCityWeather(raw: string): CityWeather | undefined {
  const normalized = normalizeCityName(raw);
  return Object.hasOwn(WEATHER_FIXTURES, normalized) ? WEATHER_FIXTURES[normalized] : undefined;
}

export function celsiusToFahrenheit(celsius: number): number {
  return roundToOneDecimal((celsius * 9) / 5 + 32);
}

export function roundToOneDecimal(value: number): number {
  return Math.round(value * 10) / 10;
}

export function resolveTemperatureUnit(state: SessionStateMap): TemperatureUnit {
  return state[STATE_KEYS.TEMPERATURE_UNIT] === "Fahrenheit" ? "Fahrenheit" : DEFAULT_TEMPERATURE_UNIT;
}

export function formatWeatherReport(
  weather: CityWeather,
  temperature: number,
  unit: TemperatureUnit
): string {
  return `The weather in ${weather.displayName} is ${weather.condition} with a temperature of ${String(
    roundToOneDecimal(temperature)
  )} degrees ${unit}.`;
}

function readCity(args: ToolArguments): string | ToolResult {
  const city = args.city;
  if (typeof city !== "string" || city.trim() === "") {
    return toolFailure(TOOL_ERROR_KINDS.VALIDATION, "city must be a non-empty string");
  }
  return city;
}

function reportFor(city: string, unit: TemperatureUnit): ToolResult {
  const weather = lookupCityWeather(city);
  if (!weather) {
    return toolFailure(TOOL_ERROR_KINDS.NOT_FOUND, `no weather data for ${city}`);
  }

  const temperature =
    unit === "Fahrenheit" ? celsiusToFahrenheit(weather.temperatureC) : weather.temperatureC;
  return toolSuccess({
    report: formatWeatherReport(weather, temperature, unit),
    city: weather.displayName,
    condition: weather.condition,
    temperature,
    unit,
  });
}

export function getWeather(args: ToolArguments): ToolResult {
  const city = readCity(args);
  if (typeof city !== "string") {
    return city;
  }
  return reportFor(city, DEFAULT_TEMPERATURE_UNIT);
}

/**
 * Reports in the session's preferred unit and remembers the normalized city
 * under `last_city_checked_stateful`. Failures carry no state write.
 */
export function getWeatherStateful(args: ToolArguments, state: SessionStateMap): ToolResult {
  const city = readCity(args);
  if (typeof city !== "string") {
    return city;
  }

  const result = reportFor(city, resolveTemperatureUnit(state));
  if (result.kind === "failure") {
    return result;
  }
  return toolSuccess(result.payload, {
    [STATE_KEYS.LAST_CITY_CHECKED]: normalizeCityName(city),
  });
}

const CITY_PARAMETER = {
  name: "city",
  description: "Name of the city, e.g. London or New York.",
  required: true,
} as const;

export const getWeatherTool: ToolDefinition = {
  name: "get_weather",
  description: "Retrieves the current weather report for a specified city.",
  parameters: [CITY_PARAMETER],
  responseField: "report",
  run: (args) => getWeather(args),
};

export const getWeatherStatefulTool: ToolDefinition = {
  name: "get_weather_stateful",
  description:
    "Retrieves the current weather for a city, formatted in the temperature unit stored in session state.",
  parameters: [CITY_PARAMETER],
  responseField: "report",
  run: getWeatherStateful,
};
