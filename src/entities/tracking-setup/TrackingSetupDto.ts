import type {CameraDto} from '../camera/CameraDto'

export const TRACKING_SETUP_FORMAT_VERSION = 1

export interface TrackingSetupDto {
  version: number
  name?: string
  cameras: CameraDto[]
}
