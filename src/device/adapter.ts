import {
  DeviceUnreachableError,
  OperationTimeoutError,
  UiHierarchyUnavailableError,
} from "../errors.js";
import * as android from "../platforms/android.js";
import type { DeviceInfo, Frame, UiElement } from "../types.js";
import { ExecError } from "../utils/exec.js";
import { decodeScreenshot } from "../utils/image.js";

/** Source of the on-screen UI hierarchy. */
export interface UiHierarchySource {
  /** Rejects with UiHierarchyUnavailableError when no dump can be read. */
  uiElements(): Promise<UiElement[]>;
}

/**
 * Everything the discovery engine needs from a device. A rejection with
 * DeviceUnreachableError means the device is gone; any other rejection
 * fails the current attempt only.
 */
export interface DeviceAdapter extends UiHierarchySource {
  readonly id: string;
  tap(x: number, y: number): Promise<void>;
  pressBack(): Promise<void>;
  screenshot(): Promise<Frame>;
  /**
   * Static metadata. The hardware version cannot be read from the device,
   * so the caller supplies it.
   */
  readDeviceInfo(hardwareVersion: string): Promise<DeviceInfo>;
  openCamera(): Promise<void>;
  foregroundActivity(): Promise<string>;
}

const UNKNOWN = "unknown";

/** Device adapter over adb, addressed by serial or `ip:port`. */
export class AdbDeviceAdapter implements DeviceAdapter {
  private constructor(
    readonly id: string,
    private readonly adb: android.AdbSettings,
  ) {}

  /**
   * Connects over TCP/IP when `address` looks like `host:port`, then checks
   * the device is listed as ready.
   */
  static async connect(
    address: string,
    adb: android.AdbSettings = android.DEFAULT_ADB_SETTINGS,
  ): Promise<AdbDeviceAdapter> {
    return guard(`connect ${address}`, async () => {
      if (/^[\w.-]+:\d+$/.test(address)) {
        await android.connect(address, adb);
      }
      const devices = await android.listDevices(adb);
      const device = devices.find((d) => d.id === address);
      if (!device || device.status !== "device") {
        throw new Error(
          device
            ? `Device ${address} is ${device.status}`
            : `Device ${address} not found. Check the IP and port.`,
        );
      }
      return new AdbDeviceAdapter(address, adb);
    });
  }

  tap(x: number, y: number): Promise<void> {
    return guard(`tap ${x},${y}`, () => android.tap(x, y, this.id, this.adb));
  }

  pressBack(): Promise<void> {
    return guard("back", () => android.pressKey("back", this.id, this.adb));
  }

  screenshot(): Promise<Frame> {
    return guard("screenshot", async () => {
      const png = await android.screenshot(this.id, this.adb);
      return decodeScreenshot(png);
    });
  }

  /**
   * uiautomator often refuses to dump while the camera preview animates, so
   * a failed dump is not taken as a lost device.
   */
  async uiElements(): Promise<UiElement[]> {
    try {
      return await android.getUiTree(this.id, this.adb);
    } catch (error) {
      if (error instanceof ExecError && error.timedOut) {
        throw new OperationTimeoutError("ui dump", { cause: error });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new UiHierarchyUnavailableError(reason, { cause: error });
    }
  }

  readDeviceInfo(hardwareVersion: string): Promise<DeviceInfo> {
    return guard("read device info", async () => {
      const [brand, model, release, screen, cameraPackage] = await Promise.all([
        android.getProp("ro.product.brand", this.id, this.adb),
        android.getProp("ro.product.model", this.id, this.adb),
        android.getProp("ro.build.version.release", this.id, this.adb),
        android.getScreenSize(this.id, this.adb),
        android.getCameraPackage(this.id, this.adb),
      ]);
      const cameraVersion = cameraPackage
        ? await android.getPackageVersion(cameraPackage, this.id, this.adb)
        : undefined;

      return {
        profile: {
          hardwareVersion,
          softwareVersion: release || UNKNOWN,
          brand: brand || UNKNOWN,
          model: model || UNKNOWN,
          cameraVersion: cameraVersion ?? UNKNOWN,
        },
        screen,
      };
    });
  }

  openCamera(): Promise<void> {
    return guard("open camera", () => android.openCamera(this.id, this.adb));
  }

  foregroundActivity(): Promise<string> {
    return guard("foreground activity", () =>
      android.getForegroundActivity(this.id, this.adb),
    );
  }
}

async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ExecError && error.timedOut) {
      throw new OperationTimeoutError(operation, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new DeviceUnreachableError(`${operation} failed: ${reason}`, { cause: error });
  }
}
