export interface DailyForecast {
  date: string; // YYYY-MM-DD
  minTemperature: number;
  maxTemperature: number;
  condition: string;
}

export interface WeatherInfo {
  location: string;
  temperature: number; // °C
  condition: string;
  humidity?: number;
  forecast: DailyForecast[];
}
