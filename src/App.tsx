import React, { useState } from 'react';
import NumberInput from '@/components/NumberInput';
import Select from '@/components/Select';
import { generateBriefing } from '@/lib/briefing';
import { errorMessage } from '@/lib/errors';
import { manualWeather } from '@/lib/metar';
import { airportDataSchema, fetchValidated, weatherSnapshotSchema } from '@/lib/wire';
import type { AirportData, DepartureProcedure, Operation, PerformanceSummary, WeatherSnapshot } from '@/types';

type Num = number | null;

const OPERATIONS = [
  { label: 'Departure', value: 'departure' },
  { label: 'Arrival', value: 'arrival' },
] as const;

export default function App() {
  const [operation, setOperation] = useState<Operation>('departure');
  const [icao, setIcao] = useState<string>('');
  const [runway, setRunway] = useState<string>('');

  // airport / runway (manual entry allowed everywhere)
  const [airport, setAirport] = useState<AirportData | null>(null);
  const [elevationFt, setElevation] = useState<Num>(null);
  const [runwayLengthFt, setRunwayLength] = useState<Num>(null);
  const [runwayHeading, setRunwayHeading] = useState<Num>(null);
  const [surface, setSurface] = useState<string>('Asphalt');

  // weather; any edit turns a fetched METAR into manual weather
  const [metar, setMetar] = useState<WeatherSnapshot | null>(null);
  const [tempC, setTemp] = useState<Num>(null);
  const [altimeterInHg, setAltimeter] = useState<Num>(null);
  const [windDir, setWindDir] = useState<Num>(null);
  const [windVariable, setWindVariable] = useState<boolean>(false);
  const [windSpeedKt, setWindSpeed] = useState<Num>(0);
  const [windGustKt, setWindGust] = useState<Num>(null);

  const [procName, setProcName] = useState<string>('');
  const [procGradient, setProcGradient] = useState<Num>(null);
  const [procInitialAlt, setProcInitialAlt] = useState<Num>(null);
  const [weightLb, setWeight] = useState<Num>(3600);

  const [status, setStatus] = useState<string>('');
  const [error, setError] = useState<string>('');
  const [result, setResult] = useState<{ performance: PerformanceSummary; markdown: string } | null>(null);

  function editWeather<T>(set: (v: T) => void) {
    return (v: T) => {
      set(v);
      setMetar(null);
    };
  }

  async function onFetch() {
    const code = icao.trim().toUpperCase();
    if (!/^[A-Z0-9]{4}$/.test(code)) {
      setStatus('Enter a 4-letter ICAO (e.g., KDEN)');
      return;
    }
    setStatus('Fetching…');
    setError('');

    const [w, a] = await Promise.allSettled([
      fetchValidated(`/api/metar?icao=${encodeURIComponent(code)}`, weatherSnapshotSchema),
      runway.trim()
        ? fetchValidated(
            `/api/airport?icao=${encodeURIComponent(code)}&runway=${encodeURIComponent(runway.trim())}`,
            airportDataSchema,
          )
        : Promise.reject(new Error('enter a runway to look it up')),
    ]);

    const notes: string[] = [];
    if (w.status === 'fulfilled') {
      const m = w.value;
      setMetar(m);
      setTemp(m.tempC);
      setAltimeter(m.altimeterInHg);
      setWindVariable(m.windDir === 'VRB');
      setWindDir(m.windDir === 'VRB' ? null : m.windDir);
      setWindSpeed(m.windSpeedKt);
      setWindGust(m.windGustKt);
    } else {
      notes.push(`METAR: ${errorMessage(w.reason)} - enter weather manually`);
    }

    if (a.status === 'fulfilled') {
      const ap = a.value;
      setAirport(ap);
      setRunway(ap.runway);
      setElevation(ap.elevationFt);
      setRunwayLength(ap.runwayLengthFt);
      setRunwayHeading(ap.runwayHeading);
      setSurface(ap.surface);
    } else {
      notes.push(`Airport: ${errorMessage(a.reason)} - enter runway data manually`);
    }
    setStatus(notes.join(' · '));
  }

  function onGenerate() {
    setError('');
    if (elevationFt == null || runwayLengthFt == null || runwayHeading == null) {
      setError('Field elevation, runway length and runway heading are required');
      return;
    }
    if (tempC == null || altimeterInHg == null || windSpeedKt == null || (!windVariable && windDir == null)) {
      setError('Temperature, altimeter and wind are required');
      return;
    }

    const code = icao.trim().toUpperCase() || 'ZZZZ';
    const ap: AirportData = {
      icao: code,
      name: airport?.name ?? `${code} (manual)`,
      elevationFt,
      latitude: airport?.latitude ?? 0,
      longitude: airport?.longitude ?? 0,
      runway: runway.trim().toUpperCase() || '--',
      runwayLengthFt,
      runwayTrueHeading: airport?.runwayTrueHeading ?? runwayHeading,
      runwayHeading,
      surface,
      magneticVariation: airport?.magneticVariation ?? 0,
      magVarSource: airport?.magVarSource ?? 'UNKNOWN',
      source: airport ? airport.source : 'Manual input',
    };
    const weather = metar ?? manualWeather(code, {
      windDir: windVariable || windDir == null ? 'VRB' : windDir,
      windSpeedKt,
      windGustKt,
      tempC,
      altimeterInHg,
    });
    const procedure: DepartureProcedure | null = operation === 'departure' && procName.trim() && procGradient != null
      ? { name: procName.trim().toUpperCase(), requiredGradientFtPerNm: procGradient, initialAltitudeFt: procInitialAlt }
      : null;

    try {
      setResult(generateBriefing({ operation, airport: ap, weather, procedure, weightLb: weightLb ?? undefined }));
    } catch (e) {
      setResult(null);
      setError(errorMessage(e));
    }
  }

  function onReset() {
    setAirport(null); setMetar(null); setResult(null); setStatus(''); setError('');
    setElevation(null); setRunwayLength(null); setRunwayHeading(null); setSurface('Asphalt');
    setTemp(null); setAltimeter(null); setWindDir(null); setWindVariable(false); setWindSpeed(0); setWindGust(null);
    setProcName(''); setProcGradient(null); setProcInitialAlt(null); setWeight(3600);
  }

  const r = result?.performance;

  return (
    <div className="min-h-screen p-6 sm:p-10">
      <div className="max-w-3xl mx-auto">
        <header className="mb-6">
          <h1 className="text-2xl font-semibold">SR22T Runway Brief</h1>
          <p className="text-gray-600 mt-1">POH performance at 3600 lb. Headings and wind are magnetic.</p>
        </header>

        <div className="grid grid-cols-1 sm:grid-cols-3 gap-4">
          <Select label="Operation" value={operation} options={OPERATIONS} onValue={setOperation} />
          <label className="block">
            <span className="block text-sm font-medium text-gray-700 mb-1">ICAO</span>
            <input
              value={icao}
              onChange={e => setIcao(e.target.value.toUpperCase())}
              className="w-full rounded-xl border px-3 py-2 border-gray-300 outline-none focus:ring-2 focus:ring-blue-500"
              placeholder="KDEN"
              maxLength={4}
            />
          </label>
          <label className="block">
            <span className="block text-sm font-medium text-gray-700 mb-1">Runway</span>
            <input
              value={runway}
              onChange={e => setRunway(e.target.value.toUpperCase())}
              className="w-full rounded-xl border px-3 py-2 border-gray-300 outline-none focus:ring-2 focus:ring-blue-500"
              placeholder="17L"
              maxLength={6}
            />
          </label>
        </div>

        <h2 className="mt-6 mb-2 font-semibold">Runway</h2>
        <div className="grid grid-cols-1 sm:grid-cols-2 gap-4">
          <NumberInput label="Field Elevation" value={elevationFt} onValue={setElevation} step={1} suffix="ft" />
          <NumberInput label="Runway Length" value={runwayLengthFt} onValue={setRunwayLength} min={0} step={10} suffix="ft" />
          <NumberInput
            label="Runway Heading"
            value={runwayHeading}
            onValue={setRunwayHeading}
            min={0}
            max={360}
            step={1}
            suffix="°M"
            hint={airport && airport.magVarSource !== 'NOAA_WMM'
              ? `${airport.runwayTrueHeading}°T, variation from ${airport.magVarSource} - verify`
              : undefined}
          />
          <label className="block">
            <span className="block text-sm font-medium text-gray-700 mb-1">Surface</span>
            <input
              value={surface}
              onChange={e => setSurface(e.target.value)}
              className="w-full rounded-xl border px-3 py-2 border-gray-300 outline-none focus:ring-2 focus:ring-blue-500"
            />
          </label>
        </div>

        <h2 className="mt-6 mb-2 font-semibold">Weather</h2>
        <div className="grid grid-cols-1 sm:grid-cols-2 gap-4">
          <NumberInput label="Outside Air Temperature" value={tempC} onValue={editWeather(setTemp)} step={1} suffix="°C" />
          <NumberInput label="Altimeter" value={altimeterInHg} onValue={editWeather(setAltimeter)} step={0.01} suffix="inHg" />
          <div className="grid grid-cols-2 gap-3">
            <NumberInput
              label="Wind Direction"
              value={windDir}
              onValue={editWeather(setWindDir)}
              min={0}
              max={360}
              step={10}
              suffix="°M"
              disabled={windVariable}
            />
            <label className="flex items-center gap-2 mt-6">
              <input
                type="checkbox"
                checked={windVariable}
                onChange={e => editWeather(setWindVariable)(e.target.checked)}
                className="h-4 w-4"
              />
              <span className="text-sm text-gray-800">Variable</span>
            </label>
          </div>
          <div className="grid grid-cols-2 gap-3">
            <NumberInput label="Wind Speed" value={windSpeedKt} onValue={editWeather(setWindSpeed)} min={0} step={1} suffix="kt" />
            <NumberInput label="Gust" value={windGustKt} onValue={editWeather(setWindGust)} min={0} step={1} suffix="kt" />
          </div>
        </div>

        {operation === 'departure' && (
          <>
            <h2 className="mt-6 mb-2 font-semibold">Departure Procedure (optional)</h2>
            <div className="grid grid-cols-1 sm:grid-cols-3 gap-4">
              <label className="block">
                <span className="block text-sm font-medium text-gray-700 mb-1">Name</span>
                <input
                  value={procName}
                  onChange={e => setProcName(e.target.value)}
                  className="w-full rounded-xl border px-3 py-2 border-gray-300 outline-none focus:ring-2 focus:ring-blue-500"
                  placeholder="PLAINS3"
                />
              </label>
              <NumberInput label="Required Gradient" value={procGradient} onValue={setProcGradient} min={0} step={10} suffix="ft/NM" />
              <NumberInput label="Initial Altitude" value={procInitialAlt} onValue={setProcInitialAlt} min={0} step={100} suffix="ft" />
            </div>
          </>
        )}

        <div className="mt-4 max-w-xs">
          <NumberInput label="Weight" value={weightLb} onValue={setWeight} min={0} max={3600} step={10} suffix="lb" />
        </div>

        <div className="mt-4 flex gap-3">
          <button
            onClick={() => void onFetch()}
            className="rounded-xl bg-emerald-600 text-white px-5 py-2 font-medium hover:bg-emerald-700"
          >
            Fetch METAR & Runway
          </button>
          <button
            onClick={onGenerate}
            className="rounded-xl bg-blue-600 text-white px-5 py-2 font-medium hover:bg-blue-700"
          >
            Generate Briefing
          </button>
          <button
            onClick={onReset}
            className="rounded-xl bg-gray-200 text-gray-800 px-5 py-2 font-medium hover:bg-gray-300"
          >
            Reset
          </button>
        </div>

        {status && <p className="mt-3 text-sm text-gray-600">{status}</p>}
        {metar?.raw && <pre className="mt-3 text-xs bg-gray-50 border rounded-xl p-3 overflow-auto">{metar.raw}</pre>}
        {error && <p role="alert" className="mt-3 text-sm text-red-600">{error}</p>}

        {r && result && (
          <section className="mt-8">
            <div className="grid grid-cols-1 sm:grid-cols-3 gap-4">
              <div className={`rounded-2xl border p-4 ${r.decision === 'GO' ? 'bg-emerald-50' : 'bg-red-50'}`}>
                <h2 className="font-semibold mb-2">Decision</h2>
                <p className="text-3xl font-bold">{r.decision}</p>
              </div>
              <div className="rounded-2xl border p-4 bg-white">
                <h2 className="font-semibold mb-2">{r.operation === 'departure' ? 'Takeoff (50 ft)' : 'Landing (50 ft)'}</h2>
                <p className="text-3xl font-bold">
                  {r.operation === 'departure' ? r.takeoff.total_distance_ft : r.landing.total_distance_ft} ft
                </p>
              </div>
              <div className="rounded-2xl border p-4 bg-white">
                <h2 className="font-semibold mb-2">Margin</h2>
                <p className="text-3xl font-bold">{r.margin.marginFt} ft</p>
                <p className="text-sm text-gray-600">{r.margin.category}</p>
              </div>
            </div>
            <pre className="mt-4 whitespace-pre-wrap text-sm bg-white border rounded-2xl p-4">{result.markdown}</pre>
          </section>
        )}

        <footer className="mt-10 text-xs text-gray-500">
          <p>
            METAR via AWC with NOAA fallback; runways from OurAirports (true headings converted to magnetic).
            Not a substitute for the POH or official charts.
          </p>
        </footer>
      </div>
    </div>
  );
}
