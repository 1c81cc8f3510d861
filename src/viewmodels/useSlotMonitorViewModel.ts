import { useEffect, useMemo, useState } from "react";
import { MonitorSettingsDto } from "../domain/settings";
import { CanonicalDeviceView, normalizeDeviceView } from "../domain/deviceView";
import { ErrorKind, asTechnicalError, errorKindOf } from "../domain/errors";
import { SlotId } from "../domain/slots";
import {
  DeviceMonitorDependencies,
  DeviceMonitorService
} from "../services/deviceMonitorService";

export interface MonitorNotice {
  kind: ErrorKind;
  message: string;
}

export interface FetchProgress {
  completed: number;
  total: number;
}

export interface SlotMonitorViewModel {
  host: string;
  username: string;
  password: string;
  isConnected: boolean;
  isBusy: boolean;
  slots: SlotId[];
  views: Record<SlotId, CanonicalDeviceView>;
  failures: Record<SlotId, string>;
  progress?: FetchProgress;
  error?: MonitorNotice;
  info?: string;
  setHost: (host: string) => void;
  setUsername: (username: string) => void;
  setPassword: (password: string) => void;
  connect: () => Promise<void>;
  refreshSlot: (slotId: SlotId) => Promise<void>;
  refreshAll: () => Promise<void>;
  cancel: () => Promise<void>;
  disconnect: () => Promise<void>;
}

const NO_DEPENDENCIES: DeviceMonitorDependencies = {};

function noticeOf(err: unknown): MonitorNotice {
  const technical = asTechnicalError(err);
  return { kind: errorKindOf(technical), message: technical.message };
}

export function useSlotMonitorViewModel(
  settings: MonitorSettingsDto,
  dependencies: DeviceMonitorDependencies = NO_DEPENDENCIES
): SlotMonitorViewModel {
  const [host, setHost] = useState(settings.host);
  const [username, setUsername] = useState(settings.username);
  const [password, setPassword] = useState(settings.password);
  const [isConnected, setConnected] = useState(false);
  const [isBusy, setBusy] = useState(false);
  const [slots, setSlots] = useState<SlotId[]>([]);
  const [views, setViews] = useState<Record<SlotId, CanonicalDeviceView>>({});
  const [failures, setFailures] = useState<Record<SlotId, string>>({});
  const [progress, setProgress] = useState<FetchProgress | undefined>(undefined);
  const [error, setError] = useState<MonitorNotice | undefined>(undefined);
  const [info, setInfo] = useState<string | undefined>(undefined);
  const service = useMemo(
    () => new DeviceMonitorService(settings, dependencies),
    [settings, dependencies]
  );

  useEffect(() => {
    const unsubscribe = service.subscribe({
      onSlotsDiscovered: (found) => setSlots(found),
      onProgress: (completed, total) => setProgress({ completed, total }),
      onSlotResult: (slotId, outcome) => {
        if (outcome.ok) {
          const view = normalizeDeviceView(outcome.payload);
          setViews((current) => ({ ...current, [slotId]: view }));
          setFailures((current) => {
            const { [slotId]: _cleared, ...rest } = current;
            return rest;
          });
        } else {
          setFailures((current) => ({ ...current, [slotId]: outcome.error.message }));
        }
      },
      onAllComplete: (report) => {
        const succeeded = Array.from(report.outcomes.values()).filter((outcome) => outcome.ok).length;
        setInfo(`Fetched ${succeeded} of ${report.outcomes.size} slots.`);
      },
      onError: (kind, message) => setError({ kind, message })
    });
    return () => {
      unsubscribe();
      service.close().catch((err: unknown) => {
        service.logs.logger("SlotMonitorViewModel").error(`Closing the monitor failed: ${noticeOf(err).message}`);
      });
    };
  }, [service]);

  const connect = async (): Promise<void> => {
    setBusy(true);
    setError(undefined);
    try {
      await service.connect(host, username, password);
      setConnected(true);
      const found = await service.discoverSlots();
      setInfo(`Connected to ${host}; ${found.length} slot(s) detected.`);
    } catch (err) {
      setConnected(service.isConnected());
      setError(noticeOf(err));
    } finally {
      setBusy(false);
    }
  };

  const refreshSlot = async (slotId: SlotId): Promise<void> => {
    setBusy(true);
    try {
      const outcome = await service.fetchOne(slotId);
      setInfo(outcome.ok ? `Slot ${slotId} refreshed.` : undefined);
    } catch (err) {
      setError(noticeOf(err));
    } finally {
      setBusy(false);
    }
  };

  const refreshAll = async (): Promise<void> => {
    setBusy(true);
    setProgress({ completed: 0, total: slots.length });
    try {
      const report = await service.fetchAll(slots);
      if (report?.status === "cancelled") {
        setInfo("Fetch cancelled.");
      }
    } catch (err) {
      setError(noticeOf(err));
    } finally {
      setBusy(false);
    }
  };

  const cancel = async (): Promise<void> => {
    try {
      await service.cancel();
    } catch (err) {
      setError(noticeOf(err));
    }
  };

  const disconnect = async (): Promise<void> => {
    try {
      await service.close();
      setConnected(false);
      setSlots([]);
      setViews({});
      setFailures({});
      setProgress(undefined);
      setInfo("Disconnected.");
    } catch (err) {
      setError(noticeOf(err));
    }
  };

  return {
    host,
    username,
    password,
    isConnected,
    isBusy,
    slots,
    views,
    failures,
    progress,
    error,
    info,
    setHost,
    setUsername,
    setPassword,
    connect,
    refreshSlot,
    refreshAll,
    cancel,
    disconnect
  };
}
