import type { ForecastRecord, ObservationRecord } from '../types';

export const FETCHED_AT = '2024-03-01T12:00:00.000Z';

const HEADINGS = [
    'Forecast for the rest of Friday',
    'Forecast for Saturday 2 March',
    'Forecast for Sunday 3 March',
    'Forecast for Monday 4 March',
    'Forecast for Tuesday 5 March',
    'Forecast for Wednesday 6 March',
    'Forecast for Thursday 7 March',
    'Forecast for Friday 8 March',
];

export const dunalleyLine = (i: number) =>
    `Dunalley      Mostly sunny. Min ${10 + i}. Max ${20 + i}. Chance of any rain: ${i * 10}%.`;

/**
 * A précis product issued 4:40 am EDT on Friday 1 March 2024 with one section
 * per entry of `dunalleyLines` (null leaves Dunalley out of that section).
 */
export const precisText = (dunalleyLines: (string | null)[]) =>
    [
        'IDT16710',
        'Australian Government Bureau of Meteorology',
        'Tasmania',
        '',
        'Precis Forecast for Tasmania',
        'Issued at 4:40 am EDT on Friday 1 March 2024',
        'for the period until midnight EDT Friday 8 March 2024.',
        '',
        ...dunalleyLines.flatMap((line, i) => [
            HEADINGS[i],
            'Hobart        Sunny. Min 9. Max 21.',
            ...(line === null ? [] : [line]),
            '',
        ]),
    ].join('\n');

export const sevenDayPrecis = () => precisText([0, 1, 2, 3, 4, 5, 6].map(dunalleyLine));

export const observationItem = (overrides: Record<string, unknown> = {}) => ({
    sort_order: 0,
    wmo: 94951,
    name: 'Dunalley (Henry Anson)',
    local_date_time_full: '20240301200000',
    aifstime_utc: '20240301090000',
    air_temp: 18.4,
    rel_hum: 72,
    wind_dir: 'NW',
    wind_spd_kmh: 15,
    rain_trace: '0.4',
    ...overrides,
});

export const observationJson = (data: unknown[]) =>
    JSON.stringify({
        observations: {
            notice: [],
            header: [{ ID: 'IDT60801', name: 'Dunalley (Henry Anson)', state: 'Tasmania' }],
            data,
        },
    });

export const forecastRecord = (overrides: Partial<ForecastRecord> = {}): ForecastRecord => ({
    kind: 'forecast',
    station_id: 'Dunalley',
    issued_at: '2024-02-29T17:40:00.000Z',
    valid_date: '2024-03-01',
    period_index: 0,
    summary_text: 'Mostly sunny.',
    min_temp: 10,
    max_temp: 20,
    rain_probability: 0,
    rain_amount_range: null,
    fetched_at: FETCHED_AT,
    ...overrides,
});

export const observationRecord = (overrides: Partial<ObservationRecord> = {}): ObservationRecord => ({
    kind: 'observation',
    station_id: '94951',
    observed_at: '2024-03-01T09:00:00.000Z',
    local_date: '2024-03-01',
    temperature: 18.4,
    humidity: 72,
    wind_speed: 15,
    wind_direction: 'NW',
    rainfall_since_9am: 0.4,
    fetched_at: FETCHED_AT,
    ...overrides,
});
