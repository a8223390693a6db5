import type { FeatureInput, RushHourFlag } from '@metro-traffic/dto'
import { TrafficForm } from './types'

// Rounded to 2 decimals, as the model was trained on.
export function fahrenheitToKelvin(f: number): number {
  return Math.round(((f - 32) * 5 / 9 + 273.15) * 100) / 100
}

/** Morning 07:00-09:59 and evening 16:00-18:59 peaks. */
export function isRushHour(hour: number): RushHourFlag {
  return (hour >= 7 && hour <= 9) || (hour >= 16 && hour <= 18) ? 1 : 0
}

export function buildFeatureInput(form: TrafficForm): FeatureInput {
  return {
    holiday: form.holiday,
    temp: fahrenheitToKelvin(form.temperatureF),
    rain_1h: form.rain1h ?? 0,
    snow_1h: form.snow1h ?? 0,
    clouds_all: form.cloudsAll,
    weather_main: form.weatherMain,
    hour: form.hour,
    day_of_week: form.dayOfWeek,
    month: form.month,
    is_rush_hour: isRushHour(form.hour)
  }
}
