import axios, { AxiosError } from "axios";
import { ProviderError } from "../../errors.js";
import {
  assessSeverity,
  isSevereCode,
  OpenWeatherSource,
  parseCurrentWeather,
  parseForecastAlerts,
} from "../weather.js";

describe("assessSeverity", () => {
  it.each([
    [211, 20, "severe_weather"],
    [502, 20, "severe_weather"],
    [781, 20, "severe_weather"],
    [800, 45, "extreme_heat"],
    [800, -30, "extreme_cold"],
    [800, 44.9, "normal"],
    [501, 20, "normal"],
  ])("code %i at %d°C is %s", (code, temp, label) => {
    expect(assessSeverity(code, temp).label).toBe(label);
    expect(assessSeverity(code, temp).isSevere).toBe(label !== "normal");
  });

  it("matches the severe condition ranges", () => {
    expect([199, 200, 232, 233, 531, 532, 771].map(isSevereCode)).toEqual([
      false,
      true,
      true,
      false,
      true,
      false,
      true,
    ]);
  });
});

const current = {
  name: "Tainan",
  weather: [{ id: 211, main: "Thunderstorm", description: "thunderstorm" }],
  main: { temp: 27.46, humidity: 88 },
};

const forecast = {
  list: [
    { dt_txt: "2026-03-01 12:00:00", weather: [{ id: 800, description: "clear sky" }], main: { temp: 30 } },
    { dt_txt: "2026-03-01 15:00:00", weather: [{ id: 202, description: "heavy thunderstorm" }], main: { temp: 26 } },
    { dt_txt: "2026-03-01 18:00:00", weather: [{ id: 800, description: "clear sky" }], main: { temp: 46 } },
  ],
};

describe("parseCurrentWeather", () => {
  it("maps the current conditions", () => {
    expect(parseCurrentWeather(current, "Tainan, Taiwan")).toEqual({
      location: "Tainan, Taiwan",
      temperatureC: 27.5,
      description: "thunderstorm",
      conditionCode: 211,
      isSevere: true,
      severityLabel: "severe_weather",
    });
  });

  it("throws on an unexpected payload", () => {
    expect(() => parseCurrentWeather({ cod: 401 }, "x")).toThrow();
  });
});

describe("parseForecastAlerts", () => {
  it("keeps only severe slots", () => {
    expect(parseForecastAlerts(forecast)).toEqual([
      { time: "2026-03-01 15:00:00", description: "heavy thunderstorm", severity: "severe_weather" },
      { time: "2026-03-01 18:00:00", description: "clear sky", severity: "extreme_heat" },
    ]);
  });
});

describe("OpenWeatherSource", () => {
  it("combines current weather with forecast alerts", async () => {
    const http = axios.create({
      adapter: async (config) => {
        const data = config.url?.endsWith("/forecast") ? forecast : current;
        return { data, status: 200, statusText: "OK", headers: {}, config };
      },
    });
    const report = await new OpenWeatherSource("test-key", http).fetchWeather(23.1, 120.3, "Tainan, Taiwan");
    expect(report.severityLabel).toBe("severe_weather");
    expect(report.upcomingAlerts).toHaveLength(2);
  });

  it("drops only the alerts when the forecast fails", async () => {
    const http = axios.create({
      adapter: async (config) => {
        if (config.url?.endsWith("/forecast")) {
          throw new AxiosError("timeout of 15000ms exceeded", "ECONNABORTED", config);
        }
        return { data: current, status: 200, statusText: "OK", headers: {}, config };
      },
    });
    const report = await new OpenWeatherSource("test-key", http).fetchWeather(23.1, 120.3, "Tainan, Taiwan");
    expect(report.description).toBe("thunderstorm");
    expect(report.upcomingAlerts).toEqual([]);
  });

  it("fails when current weather is unavailable", async () => {
    const http = axios.create({
      adapter: async (config) => {
        throw new AxiosError("timeout of 15000ms exceeded", "ECONNABORTED", config);
      },
    });
    await expect(
      new OpenWeatherSource("test-key", http).fetchWeather(0, 0, "Nowhere")
    ).rejects.toBeInstanceOf(ProviderError);
  });
});
