import type { AxiosInstance } from "axios";
import { z } from "zod";
import { errMessage, log } from "../logger.js";
import type { WeatherAlert, WeatherReport } from "../types.js";
import { httpClient, toProviderError } from "./http.js";

export interface WeatherSource {
  fetchWeather(lat: number, lon: number, location: string): Promise<WeatherReport>;
}

const OWM_CURRENT = "https://api.openweathermap.org/data/2.5/weather";
const OWM_FORECAST = "https://api.openweathermap.org/data/2.5/forecast";

const EXTREME_HEAT_C = 45;
const EXTREME_COLD_C = -30;

/** Thunderstorm (2xx), heavy rain (502-531), squall (771), tornado (781). */
export function isSevereCode(code: number): boolean {
  return (code >= 200 && code <= 232) || (code >= 502 && code <= 531) || code === 771 || code === 781;
}

export function assessSeverity(
  code: number,
  tempC: number
): { isSevere: boolean; label: string } {
  if (isSevereCode(code)) return { isSevere: true, label: "severe_weather" };
  if (tempC >= EXTREME_HEAT_C) return { isSevere: true, label: "extreme_heat" };
  if (tempC <= EXTREME_COLD_C) return { isSevere: true, label: "extreme_cold" };
  return { isSevere: false, label: "normal" };
}

/** Neutral value used when weather cannot be fetched. */
export function unknownWeather(location: string): WeatherReport {
  return {
    location,
    temperatureC: 0,
    description: "unknown",
    conditionCode: 0,
    isSevere: false,
    severityLabel: "unknown",
    upcomingAlerts: [],
  };
}

const ConditionSchema = z.object({
  id: z.number(),
  description: z.string(),
});

const CurrentSchema = z.object({
  name: z.string().optional(),
  weather: z.array(ConditionSchema).min(1),
  main: z.object({ temp: z.number() }),
});

const ForecastSchema = z.object({
  list: z
    .array(
      z.object({
        dt_txt: z.string().optional(),
        weather: z.array(ConditionSchema).min(1),
        main: z.object({ temp: z.number() }),
      })
    )
    .default([]),
});

export function parseCurrentWeather(
  data: unknown,
  location: string
): Omit<WeatherReport, "upcomingAlerts"> {
  const cur = CurrentSchema.parse(data);
  const [condition] = cur.weather;
  const { isSevere, label } = assessSeverity(condition.id, cur.main.temp);
  return {
    location: location || cur.name || "",
    temperatureC: Math.round(cur.main.temp * 10) / 10,
    description: condition.description,
    conditionCode: condition.id,
    isSevere,
    severityLabel: label,
  };
}

/** Severe slots in the forecast window. */
export function parseForecastAlerts(data: unknown): WeatherAlert[] {
  const fc = ForecastSchema.parse(data);
  const alerts: WeatherAlert[] = [];
  for (const slot of fc.list) {
    const [condition] = slot.weather;
    const { isSevere, label } = assessSeverity(condition.id, slot.main.temp);
    if (isSevere) {
      alerts.push({
        time: slot.dt_txt ?? "",
        description: condition.description,
        severity: label,
      });
    }
  }
  return alerts;
}

export class OpenWeatherSource implements WeatherSource {
  constructor(
    private readonly apiKey: string,
    private readonly http: AxiosInstance = httpClient
  ) {}

  async fetchWeather(lat: number, lon: number, location: string): Promise<WeatherReport> {
    const params = { lat, lon, appid: this.apiKey, units: "metric" };
    let current: Omit<WeatherReport, "upcomingAlerts">;
    try {
      const { data } = await this.http.get<unknown>(OWM_CURRENT, { params });
      current = parseCurrentWeather(data, location);
    } catch (err) {
      throw toProviderError("openweather", err);
    }

    const upcomingAlerts = await this.forecastAlerts(params);
    log.info("[WEATHER] report", {
      location: current.location,
      description: current.description,
      tempC: current.temperatureC,
      severe: current.isSevere,
    });
    return { ...current, upcomingAlerts };
  }

  /** Next 24 h (8 x 3 h slots). Advisory: failure only drops the alerts. */
  private async forecastAlerts(params: Record<string, string | number>): Promise<WeatherAlert[]> {
    try {
      const { data } = await this.http.get<unknown>(OWM_FORECAST, {
        params: { ...params, cnt: 8 },
      });
      return parseForecastAlerts(data);
    } catch (err) {
      log.warn("[WEATHER] forecast unavailable", { error: errMessage(err) });
      return [];
    }
  }
}
