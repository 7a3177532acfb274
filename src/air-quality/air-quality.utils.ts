import { AQI_LIMITS, GRADE_BANDS, GRADE_COLORS, GRADES, US_AQI_LIMITS } from './air-quality.constants';
import { AirGrade, AirQualityIndex, Pollutant, PollutantReading } from './interfaces/air-quality.interface';

function gradeByLimits(value: number, limits: readonly [number, number, number]): AirGrade {
  const index = limits.findIndex((limit) => value <= limit);
  return GRADES[index === -1 ? 3 : index];
}

export function gradeFor(pollutant: Pollutant, value: number): AirGrade {
  return gradeByLimits(value, GRADE_BANDS[pollutant].limits);
}

export function gradeColor(grade: string): string {
  return isAirGrade(grade) ? GRADE_COLORS[grade] : GRADE_COLORS['보통'];
}

export function isAirGrade(value: string): value is AirGrade {
  return GRADES.some((grade) => grade === value);
}

/**
 * Combined index used across the API: max(pm10, pm25 × 2), truncated.
 */
export function calculateAqi(pm10: number, pm25: number): AirQualityIndex {
  const value = Math.trunc(Math.max(pm10, pm25 * 2));
  const grade = gradeByLimits(value, AQI_LIMITS);
  return { value, grade, color: GRADE_COLORS[grade] };
}

export function usAqiToKorean(usAqi: number): AirGrade {
  return gradeByLimits(usAqi, US_AQI_LIMITS);
}

/**
 * AirKorea publishes grades as "1".."4"; a blank or unknown code is graded from the value.
 */
export function airKoreaGrade(code: string | undefined, pollutant: Pollutant, value: number): AirGrade {
  const index = Number.parseInt(code ?? '', 10);
  if (index >= 1 && index <= GRADES.length) {
    return GRADES[index - 1];
  }
  return gradeFor(pollutant, value);
}

/** AirKorea reports missing measurements as "-". */
export function parseMeasurement(value: string | undefined): number {
  const parsed = Number.parseFloat(value ?? '');
  return Number.isNaN(parsed) ? 0 : parsed;
}

export function reading(pollutant: Pollutant, value: number, grade: AirGrade = gradeFor(pollutant, value)): PollutantReading {
  return { value, grade, unit: GRADE_BANDS[pollutant].unit };
}

/**
 * Picks one region's grade out of an AirKorea informGrade string
 * such as "서울 : 보통,제주 : 좋음".
 */
export function regionGrade(informGrade: string | undefined, region: string): string | null {
  for (const entry of (informGrade ?? '').split(',')) {
    const [name, grade] = entry.split(':').map((part) => part.trim());
    if (name === region && grade) {
      return grade;
    }
  }
  return null;
}
