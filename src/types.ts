export interface Device {
  id: string;
  name: string;
  status: string;
}

export interface ScreenSize {
  width: number;
  height: number;
}

export interface Box {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * A decoded screenshot. `pixels` holds `width * height * channels` bytes,
 * row-major, RGB.
 */
export interface Frame {
  pixels: Buffer;
  width: number;
  height: number;
  channels: number;
  capturedAt: number;
}

/** Static device metadata, embedded verbatim into the output map. */
export interface DeviceProfile {
  readonly hardwareVersion: string;
  readonly softwareVersion: string;
  readonly brand: string;
  readonly model: string;
  readonly cameraVersion: string;
}

export interface DeviceInfo {
  profile: DeviceProfile;
  screen: ScreenSize;
}

/** A node of the uiautomator hierarchy. */
export interface UiElement {
  type: string;
  text: string;
  contentDesc: string;
  resourceId?: string;
  bounds: Box;
  clickable: boolean;
}
