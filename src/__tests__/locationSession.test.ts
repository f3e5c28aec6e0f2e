import { AutoPanMode, LocationSessionStatus } from "../types";
import {
  createLocationDisplay,
  createLocationSession,
} from "../domain/location";
import { FakeLocationDataSource, sampleLocation } from "./helpers/fakes";

describe("createLocationSession", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("attaches the data source to the display and starts it", async () => {
    const session = createLocationSession();
    const display = createLocationDisplay();
    const dataSource = new FakeLocationDataSource();

    const result = await session.attachAndStart(display, dataSource, {
      autoPanMode: AutoPanMode.Navigation,
    });

    expect(result).toEqual({ ok: true, value: undefined });
    expect(display.getDataSource()).toBe(dataSource);
    expect(display.getAutoPanMode()).toBe(AutoPanMode.Navigation);
    expect(dataSource.start).toHaveBeenCalledTimes(1);
    expect(session.getStatus()).toBe(LocationSessionStatus.Started);
    expect(session.isReady()).toBe(true);

    dataSource.emitLocation(sampleLocation);
    expect(display.getSnapshot().location).toEqual(sampleLocation);
  });

  it("uses recenter when no auto-pan mode is given", async () => {
    const session = createLocationSession();
    const display = createLocationDisplay(AutoPanMode.Off);

    await session.attachAndStart(display, new FakeLocationDataSource());

    expect(display.getAutoPanMode()).toBe(AutoPanMode.Recenter);
  });

  it("is not ready until the start attempt finishes", async () => {
    const session = createLocationSession();
    const dataSource = new FakeLocationDataSource("deferred");

    const pending = session.attachAndStart(createLocationDisplay(), dataSource);

    expect(session.isReady()).toBe(false);
    expect(session.getStatus()).toBe(LocationSessionStatus.Starting);

    dataSource.completeStart();
    const result = await pending;

    expect(result.ok).toBe(true);
    expect(session.isReady()).toBe(true);
    expect(session.getStatus()).toBe(LocationSessionStatus.Started);
  });

  it("becomes ready with the error when the start fails", async () => {
    const session = createLocationSession();
    const dataSource = new FakeLocationDataSource("fail");

    const result = await session.attachAndStart(
      createLocationDisplay(),
      dataSource,
    );

    expect(result).toEqual({
      ok: false,
      error: { type: "Unavailable", message: "Location services disabled" },
    });
    expect(session.isReady()).toBe(true);
    expect(session.getStatus()).toBe(LocationSessionStatus.FailedToStart);
    expect(warnSpy).toHaveBeenCalledTimes(1);
  });

  it("maps unexpected start failures to unknown errors", async () => {
    const session = createLocationSession();
    const dataSource = new FakeLocationDataSource("fail");
    dataSource.failure = new Error("GPS chip on fire");

    const result = await session.attachAndStart(
      createLocationDisplay(),
      dataSource,
    );

    expect(result).toEqual({
      ok: false,
      error: { type: "Unknown", message: "GPS chip on fire" },
    });
  });

  it("reports status changes until stopped", async () => {
    const session = createLocationSession();
    const dataSource = new FakeLocationDataSource();
    const statuses: LocationSessionStatus[] = [];
    session.onStatusChanged((status) => statuses.push(status));

    await session.attachAndStart(createLocationDisplay(), dataSource);
    await session.stop();

    expect(statuses).toEqual([
      LocationSessionStatus.Starting,
      LocationSessionStatus.Started,
      LocationSessionStatus.Stopped,
    ]);
    expect(dataSource.statusListenerCount).toBe(0);
  });

  it("detaches the display and stops the data source", async () => {
    const session = createLocationSession();
    const display = createLocationDisplay();
    const dataSource = new FakeLocationDataSource();
    await session.attachAndStart(display, dataSource);

    await session.stop();

    expect(dataSource.stop).toHaveBeenCalledTimes(1);
    expect(display.getDataSource()).toBeNull();
    expect(dataSource.locationListenerCount).toBe(0);
    expect(session.isReady()).toBe(false);
    expect(session.getStatus()).toBe(LocationSessionStatus.Stopped);
  });

  it("can be stopped repeatedly and before anything was attached", async () => {
    const session = createLocationSession();
    const dataSource = new FakeLocationDataSource();

    await session.stop();
    await session.attachAndStart(createLocationDisplay(), dataSource);
    await session.stop();
    await session.stop();

    expect(dataSource.stop).toHaveBeenCalledTimes(1);
    expect(session.getStatus()).toBe(LocationSessionStatus.Stopped);
  });

  it("cancels a start that is still in flight when stopped", async () => {
    const session = createLocationSession();
    const display = createLocationDisplay();
    const dataSource = new FakeLocationDataSource("deferred");

    const pending = session.attachAndStart(display, dataSource);
    await session.stop();
    const result = await pending;

    expect(result).toEqual({
      ok: false,
      error: {
        type: "Cancelled",
        message: "Location session stopped before start completed",
      },
    });
    expect(dataSource.stop).toHaveBeenCalled();
    expect(session.isReady()).toBe(false);
    expect(session.getStatus()).toBe(LocationSessionStatus.Stopped);
    expect(display.getDataSource()).toBeNull();
  });

  it("leaves a shared data source running for the next session", async () => {
    const display = createLocationDisplay();
    const dataSource = new FakeLocationDataSource("deferred");
    const first = createLocationSession();
    const second = createLocationSession();

    const firstStart = first.attachAndStart(display, dataSource);
    await first.stop();
    const secondStart = second.attachAndStart(display, dataSource);
    const firstResult = await firstStart;
    dataSource.completeStart();
    const secondResult = await secondStart;

    expect(firstResult).toEqual({
      ok: false,
      error: {
        type: "Cancelled",
        message: "Location session stopped before start completed",
      },
    });
    expect(secondResult).toEqual({ ok: true, value: undefined });
    expect(dataSource.stop).toHaveBeenCalledTimes(1);
    expect(dataSource.getStatus()).toBe(LocationSessionStatus.Started);
    expect(second.getStatus()).toBe(LocationSessionStatus.Started);
    expect(second.isReady()).toBe(true);
    expect(display.getDataSource()).toBe(dataSource);
  });

  it("stops the previous data source when another one is attached", async () => {
    const session = createLocationSession();
    const display = createLocationDisplay();
    const first = new FakeLocationDataSource();
    const second = new FakeLocationDataSource();

    await session.attachAndStart(display, first);
    await session.attachAndStart(display, second);

    expect(first.stop).toHaveBeenCalledTimes(1);
    expect(first.statusListenerCount).toBe(0);
    expect(second.stop).not.toHaveBeenCalled();
    expect(display.getDataSource()).toBe(second);
    expect(session.getStatus()).toBe(LocationSessionStatus.Started);
  });

  it("restarts the same data source without stopping it", async () => {
    const session = createLocationSession();
    const display = createLocationDisplay();
    const dataSource = new FakeLocationDataSource();

    await session.attachAndStart(display, dataSource);
    await session.attachAndStart(display, dataSource);

    expect(dataSource.start).toHaveBeenCalledTimes(2);
    expect(dataSource.stop).not.toHaveBeenCalled();
    expect(dataSource.statusListenerCount).toBe(1);
  });
});
