/**
 * Tests for src/platforms/android.ts
 *
 * We mock the exec/execBuffer utilities so no real ADB commands run.
 * This lets us test command-string construction and the parsing of
 * devices, wm size, package, window and UI hierarchy dumps. ExecError stays
 * real so timeouts can be told apart.
 */

import { jest } from "@jest/globals";

jest.mock("../../src/utils/exec.js", () => ({
  ...jest.requireActual<typeof import("../../src/utils/exec.js")>("../../src/utils/exec.js"),
  exec: jest.fn(),
  execBuffer: jest.fn(),
}));

import * as androidMod from "../../src/platforms/android.js";
import { ExecError, exec, execBuffer } from "../../src/utils/exec.js";

const mockExec = jest.mocked(exec);
const mockExecBuffer = jest.mocked(execBuffer);

beforeEach(() => {
  jest.clearAllMocks();
});

// ---------------------------------------------------------------------------
// listDevices
// ---------------------------------------------------------------------------
describe("listDevices", () => {
  it("parses a standard adb devices -l output with one device", async () => {
    mockExec.mockResolvedValueOnce(
      "List of devices attached\n192.168.1.20:5555      device product:cam_a model:Phone_X transport_id:1\n\n",
    );
    const devices = await androidMod.listDevices();
    expect(devices).toEqual([{ id: "192.168.1.20:5555", name: "Phone_X", status: "device" }]);
    expect(mockExec).toHaveBeenCalledWith("adb devices -l", { timeout: 15_000 });
  });

  it("parses multiple devices including an unauthorized one", async () => {
    mockExec.mockResolvedValueOnce(
      "List of devices attached\nemulator-5554          device model:Pixel_6\nABC123               unauthorized transport_id:2\n",
    );
    const devices = await androidMod.listDevices();
    expect(devices).toHaveLength(2);
    expect(devices[0].status).toBe("device");
    expect(devices[1].status).toBe("unauthorized");
    expect(devices[1].name).toBe("ABC123"); // no model token, falls back to id
  });

  it("returns an empty list when no devices are attached", async () => {
    mockExec.mockResolvedValueOnce("List of devices attached\n\n");
    expect(await androidMod.listDevices()).toHaveLength(0);
  });

  it("skips lines starting with *", async () => {
    mockExec.mockResolvedValueOnce(
      "List of devices attached\n* daemon not running; starting now at tcp:5037\nemulator-5554  device model:Pixel\n",
    );
    const devices = await androidMod.listDevices();
    expect(devices).toHaveLength(1);
    expect(devices[0].id).toBe("emulator-5554");
  });
});

// ---------------------------------------------------------------------------
// connect
// ---------------------------------------------------------------------------
describe("connect", () => {
  it("accepts 'connected to' and 'already connected to'", async () => {
    mockExec.mockResolvedValueOnce("connected to 192.168.1.20:5555\n");
    await expect(androidMod.connect("192.168.1.20:5555")).resolves.toBeUndefined();

    mockExec.mockResolvedValueOnce("already connected to 192.168.1.20:5555\n");
    await expect(androidMod.connect("192.168.1.20:5555")).resolves.toBeUndefined();
    expect(mockExec).toHaveBeenCalledWith("adb connect 192.168.1.20:5555", { timeout: 15_000 });
  });

  it("throws when adb reports a refused connection with exit code 0", async () => {
    mockExec.mockResolvedValueOnce(
      "cannot connect to 192.168.1.20:5555: Connection refused (111)\n",
    );
    await expect(androidMod.connect("192.168.1.20:5555")).rejects.toThrow(
      "adb could not connect to 192.168.1.20:5555: cannot connect to 192.168.1.20:5555: Connection refused (111)",
    );
  });
});

// ---------------------------------------------------------------------------
// input and capture
// ---------------------------------------------------------------------------
describe("tap / pressKey / screenshot", () => {
  it("taps through the device's serial", async () => {
    mockExec.mockResolvedValueOnce("");
    await androidMod.tap(220, 117, "192.168.1.20:5555");
    expect(mockExec).toHaveBeenCalledWith(
      "adb -s 192.168.1.20:5555 shell input tap 220 117",
      { timeout: 15_000 },
    );
  });

  it("sends keycode 4 for back", async () => {
    mockExec.mockResolvedValueOnce("");
    await androidMod.pressKey("back", "emulator-5554");
    expect(mockExec).toHaveBeenCalledWith(
      "adb -s emulator-5554 shell input keyevent 4",
      { timeout: 15_000 },
    );
  });

  it("captures the screen with exec-out and the screenshot timeout", async () => {
    const png = Buffer.from("png-bytes");
    mockExecBuffer.mockResolvedValueOnce(png);
    const settings = {
      binary: "/sdk/platform-tools/adb",
      commandTimeoutMs: 15_000,
      screenshotTimeoutMs: 9_000,
    };

    await expect(androidMod.screenshot("emulator-5554", settings)).resolves.toBe(png);
    expect(mockExecBuffer).toHaveBeenCalledWith(
      "/sdk/platform-tools/adb -s emulator-5554 exec-out screencap -p",
      { timeout: 9_000 },
    );
  });
});

describe("per-call settings", () => {
  it("uses the binary and timeout it is given, leaving the defaults alone", async () => {
    mockExec.mockResolvedValueOnce("").mockResolvedValueOnce("");
    const settings = { binary: "/opt/adb", commandTimeoutMs: 2_000, screenshotTimeoutMs: 4_000 };

    await androidMod.tap(1, 2, "emulator-5554", settings);
    await androidMod.tap(1, 2, "emulator-5556");

    expect(mockExec).toHaveBeenNthCalledWith(1, "/opt/adb -s emulator-5554 shell input tap 1 2", {
      timeout: 2_000,
    });
    expect(mockExec).toHaveBeenNthCalledWith(2, "adb -s emulator-5556 shell input tap 1 2", {
      timeout: 15_000,
    });
  });
});

// ---------------------------------------------------------------------------
// device metadata
// ---------------------------------------------------------------------------
describe("parseScreenSize", () => {
  it("reads the physical size", () => {
    expect(androidMod.parseScreenSize("Physical size: 720x1450\n")).toEqual({
      width: 720,
      height: 1450,
    });
  });

  it("prefers the override size", () => {
    expect(
      androidMod.parseScreenSize("Physical size: 1440x2960\nOverride size: 1080x2220\n"),
    ).toEqual({ width: 1080, height: 2220 });
  });

  it("throws on unexpected output", () => {
    expect(() => androidMod.parseScreenSize("error: no devices")).toThrow(
      "Unexpected wm size output: error: no devices",
    );
  });
});

describe("getProp", () => {
  it("trims the property value", async () => {
    mockExec.mockResolvedValueOnce("acme\r\n");
    await expect(androidMod.getProp("ro.product.brand", "emulator-5554")).resolves.toBe("acme");
    expect(mockExec).toHaveBeenCalledWith(
      "adb -s emulator-5554 shell getprop ro.product.brand",
      { timeout: 15_000 },
    );
  });
});

describe("getCameraPackage", () => {
  it("takes the package from the resolved component", async () => {
    mockExec.mockResolvedValueOnce(
      "priority=0 preferredOrder=0 match=0x108000 specificIndex=-1 isDefault=true\ncom.acme.camera/.CameraActivity\n",
    );
    await expect(androidMod.getCameraPackage("emulator-5554")).resolves.toBe("com.acme.camera");
    expect(mockExec).toHaveBeenCalledWith(
      "adb -s emulator-5554 shell cmd package resolve-activity --brief -a android.media.action.STILL_IMAGE_CAMERA",
      { timeout: 15_000 },
    );
  });

  it("returns undefined when nothing handles the intent", async () => {
    mockExec.mockResolvedValueOnce("No activity found\n");
    await expect(androidMod.getCameraPackage("emulator-5554")).resolves.toBeUndefined();
  });
});

describe("getPackageVersion", () => {
  it("reads versionName from dumpsys package", async () => {
    mockExec.mockResolvedValueOnce(
      "Packages:\n  Package [com.acme.camera] (3f2a1b):\n    versionCode=42 minSdk=29\n    versionName=4.2.0\n",
    );
    await expect(
      androidMod.getPackageVersion("com.acme.camera", "emulator-5554"),
    ).resolves.toBe("4.2.0");
  });

  it("returns undefined without a versionName", async () => {
    mockExec.mockResolvedValueOnce("Unable to find package: com.acme.camera\n");
    await expect(
      androidMod.getPackageVersion("com.acme.camera", "emulator-5554"),
    ).resolves.toBeUndefined();
  });
});

describe("openCamera / getForegroundActivity", () => {
  it("starts the still image camera intent", async () => {
    mockExec.mockResolvedValueOnce("Starting: Intent { act=android.media.action.STILL_IMAGE_CAMERA }\n");
    await androidMod.openCamera("emulator-5554");
    expect(mockExec).toHaveBeenCalledWith(
      "adb -s emulator-5554 shell am start -a android.media.action.STILL_IMAGE_CAMERA",
      { timeout: 15_000 },
    );
  });

  it("reads the focused window component", async () => {
    mockExec.mockResolvedValueOnce(
      "  mCurrentFocus=Window{5d2c1a0 u0 com.acme.camera/com.acme.camera.CameraActivity}\n  mFocusedApp=ActivityRecord{1b2 u0 com.acme.camera/.CameraActivity t12}\n",
    );
    await expect(androidMod.getForegroundActivity("emulator-5554")).resolves.toBe(
      "com.acme.camera/com.acme.camera.CameraActivity",
    );
  });

  it("falls back to the focused app", async () => {
    mockExec.mockResolvedValueOnce(
      "  mCurrentFocus=null\n  mFocusedApp=ActivityRecord{1b2 u0 com.acme.launcher/.Home t3}\n",
    );
    await expect(androidMod.getForegroundActivity("emulator-5554")).resolves.toBe(
      "com.acme.launcher/.Home",
    );
  });

  it("returns an empty string when nothing is focused", async () => {
    mockExec.mockResolvedValueOnce("WINDOW MANAGER WINDOWS\n");
    await expect(androidMod.getForegroundActivity("emulator-5554")).resolves.toBe("");
  });
});

// ---------------------------------------------------------------------------
// UI hierarchy
// ---------------------------------------------------------------------------
const DUMP =
  "<?xml version='1.0' encoding='UTF-8' standalone='yes' ?>" +
  '<hierarchy rotation="0">' +
  '<node index="0" text="" resource-id="com.acme.camera:id/switch_button" class="android.widget.ImageButton" package="com.acme.camera" content-desc="Switch camera" clickable="true" bounds="[560,1220][640,1300]" />' +
  '<node index="1" text="Photo" resource-id="" class="android.widget.TextView" package="com.acme.camera" content-desc="" clickable="false" bounds="[300,1160][360,1190]" />' +
  "</hierarchy>";

const ELEMENTS = [
  {
    type: "ImageButton",
    text: "",
    contentDesc: "Switch camera",
    resourceId: "switch_button",
    bounds: { x: 560, y: 1220, width: 80, height: 80 },
    clickable: true,
  },
  {
    type: "TextView",
    text: "Photo",
    contentDesc: "",
    resourceId: undefined,
    bounds: { x: 300, y: 1160, width: 60, height: 30 },
    clickable: false,
  },
];

describe("parseUiXml", () => {
  it("reads class, labels, resource id, bounds and clickability", () => {
    expect(androidMod.parseUiXml(DUMP)).toEqual(ELEMENTS);
  });

  it("skips nodes without bounds", () => {
    expect(androidMod.parseUiXml('<hierarchy><node text="x" clickable="true" /></hierarchy>')).toEqual([]);
  });
});

describe("getUiTree", () => {
  it("dumps straight to the terminal first", async () => {
    mockExec.mockResolvedValueOnce(`${DUMP}UI hierchary dumped to: /dev/tty\n`);

    await expect(androidMod.getUiTree("emulator-5554")).resolves.toEqual(ELEMENTS);
    expect(mockExec).toHaveBeenCalledTimes(1);
    expect(mockExec).toHaveBeenCalledWith(
      "adb -s emulator-5554 exec-out uiautomator dump /dev/tty",
      { timeout: 30_000 },
    );
  });

  it("falls back to dumping into a file and reading it back", async () => {
    mockExec
      .mockResolvedValueOnce("ERROR: null root node returned by UiTestAutomationBridge.\n")
      .mockResolvedValueOnce("UI hierchary dumped to: /sdcard/window_dump.xml\n")
      .mockResolvedValueOnce(DUMP);

    await expect(androidMod.getUiTree("emulator-5554")).resolves.toEqual(ELEMENTS);
    expect(mockExec).toHaveBeenNthCalledWith(
      2,
      "adb -s emulator-5554 shell uiautomator dump /sdcard/window_dump.xml",
      { timeout: 30_000 },
    );
    expect(mockExec).toHaveBeenNthCalledWith(
      3,
      "adb -s emulator-5554 shell cat /sdcard/window_dump.xml",
      { timeout: 15_000 },
    );
  });

  it("reports the last failure when neither dump yields XML", async () => {
    mockExec
      .mockResolvedValueOnce("ERROR: could not get idle state.\n")
      .mockRejectedValueOnce(
        new ExecError(
          "adb -s emulator-5554 shell uiautomator dump /sdcard/window_dump.xml",
          "ERROR: could not get idle state.",
          false,
        ),
      );

    await expect(androidMod.getUiTree("emulator-5554")).rejects.toThrow(
      "uiautomator dump failed: Command failed: adb -s emulator-5554 shell uiautomator dump /sdcard/window_dump.xml\nERROR: could not get idle state.",
    );
  });

  it("gives up at once on a timeout", async () => {
    const timeout = new ExecError("adb -s emulator-5554 exec-out uiautomator dump /dev/tty", "", true);
    mockExec.mockRejectedValueOnce(timeout);

    await expect(androidMod.getUiTree("emulator-5554")).rejects.toBe(timeout);
    expect(mockExec).toHaveBeenCalledTimes(1);
  });
});
