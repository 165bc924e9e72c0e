/**
 * Irrigation Dashboard
 *
 * Server-rendered overview: zones with a manual-run button, schedules,
 * recent runs and recent sensor readings. Pico CSS styles the semantic
 * HTML; HTMX posts the manual runs.
 */
import type { FC } from "hono/jsx";
import { DateTime } from "luxon";

import { parseScheduleSource } from "../../irrigation/index.js";
import type { SchedulerState, WallClock } from "../../scheduler/index.js";
import type {
  IrrigationRun,
  Schedule,
  SensorReading,
  Zone,
} from "../../store/index.js";
import { BaseLayout } from "../layouts/Base.js";

export type DashboardData = Readonly<{
  zones: ReadonlyArray<Zone>;
  schedules: ReadonlyArray<Schedule>;
  runs: ReadonlyArray<IrrigationRun>;
  readings: ReadonlyArray<SensorReading>;
}>;

type DashboardProps = {
  appName: string;
  now: WallClock;
  dbReady: boolean;
  scheduler: SchedulerState | null;
  data: DashboardData;
};

/**
 * UTC ISO timestamp shown in the controller's timezone.
 */
const localTime = (ts: string, timezone: string): string =>
  DateTime.fromISO(ts, { zone: "utc" }).setZone(timezone).toFormat("dd LLL HH:mm");

/**
 * "schedule #3" for runs a schedule started, the raw label otherwise.
 */
const sourceLabel = (source: string): string => {
  const scheduleId = parseScheduleSource(source);
  return scheduleId === null ? source : `schedule #${scheduleId}`;
};

const Muted: FC<{ text: string }> = ({ text }) => (
  <p style={{ color: "var(--pico-muted-color)" }}>
    <small>{text}</small>
  </p>
);

const StatusBar: FC<{ now: WallClock; dbReady: boolean; scheduler: SchedulerState | null }> = ({
  now,
  dbReady,
  scheduler,
}) => (
  <div class="grid" id="status">
    <article style={{ textAlign: "center", margin: "0" }}>
      <small>Local time ({now.timezone})</small>
      <p id="local-time" style={{ fontSize: "1.5rem", fontWeight: "bold", margin: "0" }}>
        {now.local}
      </p>
    </article>
    <article style={{ textAlign: "center", margin: "0" }}>
      <small>Database</small>
      <p id="db-status" style={{ fontSize: "1.5rem", fontWeight: "bold", margin: "0" }}>
        {dbReady ? "Ready" : "Not ready"}
      </p>
    </article>
    <article style={{ textAlign: "center", margin: "0" }}>
      <small>Scheduler</small>
      <p id="scheduler-status" style={{ fontSize: "1.5rem", fontWeight: "bold", margin: "0" }}>
        {scheduler?.running ? "Running" : "Stopped"}
      </p>
      {scheduler?.lastTickAt ? (
        <small>last tick {localTime(scheduler.lastTickAt, now.timezone)}</small>
      ) : null}
    </article>
  </div>
);

const ZonesTable: FC<{ zones: ReadonlyArray<Zone> }> = ({ zones }) => {
  if (zones.length === 0) {
    return <Muted text="No zones yet. POST /zones to add one." />;
  }
  return (
    <table>
      <thead>
        <tr>
          <th>Zone</th>
          <th>Description</th>
          <th />
        </tr>
      </thead>
      <tbody>
        {zones.map((zone) => (
          <tr>
            <td>{zone.name}</td>
            <td>{zone.description}</td>
            <td>
              <button
                type="button"
                class="secondary outline"
                hx-post={`/run/${encodeURIComponent(zone.name)}`}
                hx-swap="none"
                hx-on--after-request="window.location.reload()"
              >
                Run now
              </button>
            </td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};

const SchedulesTable: FC<{
  schedules: ReadonlyArray<Schedule>;
  zoneNames: ReadonlyMap<number, string>;
}> = ({ schedules, zoneNames }) => {
  if (schedules.length === 0) {
    return <Muted text="No schedules." />;
  }
  return (
    <table>
      <thead>
        <tr>
          <th>Zone</th>
          <th>Start</th>
          <th>Minutes</th>
          <th>Days</th>
          <th>Moisture gate</th>
          <th>Last handled</th>
        </tr>
      </thead>
      <tbody>
        {schedules.map((schedule) => (
          <tr style={schedule.enabled ? undefined : { opacity: "0.5" }}>
            <td>{zoneNames.get(schedule.zoneId) ?? `#${schedule.zoneId}`}</td>
            <td>{schedule.startTime}</td>
            <td>{schedule.durationMinutes}</td>
            <td>{schedule.daysOfWeek === "*" ? "every day" : schedule.daysOfWeek}</td>
            <td>
              {schedule.skipIfMoistureOver === null
                ? "—"
                : `≥ ${schedule.skipIfMoistureOver} (${schedule.moistureLookbackMinutes} min)`}
            </td>
            <td>
              {schedule.lastRunDate && schedule.lastRunMinute
                ? `${schedule.lastRunDate} ${schedule.lastRunMinute}`
                : "never"}
            </td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};

const RunsTable: FC<{ runs: ReadonlyArray<IrrigationRun>; timezone: string }> = ({
  runs,
  timezone,
}) => {
  if (runs.length === 0) {
    return <Muted text="No runs recorded." />;
  }
  return (
    <table>
      <thead>
        <tr>
          <th>When</th>
          <th>Zone</th>
          <th>Minutes</th>
          <th>Source</th>
        </tr>
      </thead>
      <tbody>
        {runs.map((run) => (
          <tr>
            <td>{localTime(run.ts, timezone)}</td>
            <td>{run.zoneName}</td>
            <td>{run.durationMinutes}</td>
            <td>{sourceLabel(run.source)}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};

const ReadingsTable: FC<{ readings: ReadonlyArray<SensorReading>; timezone: string }> = ({
  readings,
  timezone,
}) => {
  if (readings.length === 0) {
    return <Muted text="No sensor readings." />;
  }
  return (
    <table>
      <thead>
        <tr>
          <th>When</th>
          <th>Zone</th>
          <th>Metric</th>
          <th>Value</th>
        </tr>
      </thead>
      <tbody>
        {readings.map((reading) => (
          <tr>
            <td>{localTime(reading.ts, timezone)}</td>
            <td>{reading.zoneName}</td>
            <td>{reading.metric}</td>
            <td>{reading.value}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};

/**
 * Main Dashboard page component.
 */
export const Dashboard: FC<DashboardProps> = ({ appName, now, dbReady, scheduler, data }) => {
  const zoneNames = new Map(data.zones.map((zone) => [zone.id, zone.name] as const));

  return (
    <BaseLayout title={appName}>
      <h1>{appName}</h1>

      <StatusBar now={now} dbReady={dbReady} scheduler={scheduler} />

      <section id="zones" style={{ marginTop: "2rem" }}>
        <h2>Zones</h2>
        <ZonesTable zones={data.zones} />
      </section>

      <section id="schedules">
        <h2>Schedules</h2>
        <SchedulesTable schedules={data.schedules} zoneNames={zoneNames} />
      </section>

      <section id="runs">
        <h2>Recent runs</h2>
        <RunsTable runs={data.runs} timezone={now.timezone} />
      </section>

      <section id="readings">
        <h2>Recent readings</h2>
        <ReadingsTable readings={data.readings} timezone={now.timezone} />
      </section>
    </BaseLayout>
  );
};
