export {TrackingSetup} from './TrackingSetup'
export {TRACKING_SETUP_FORMAT_VERSION} from './TrackingSetupDto'
export type {TrackingSetupDto} from './TrackingSetupDto'
