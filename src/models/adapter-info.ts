/**
 * Adapter firmware and hardware information.
 */

export interface AdapterInfo {
  /**
   * Firmware version as `major.minor.patch`
   */
  version: string;

  /**
   * Firmware build number
   */
  build: number;

  /**
   * Link layer version
   */
  llVersion: number;

  /**
   * BGAPI protocol version
   */
  protocolVersion: number;

  /**
   * Hardware version
   */
  hardware: number;
}
