export {Camera, createCalibration} from './Camera'
export type {CameraCalibration} from './Camera'
export type {CameraDto, CameraCalibrationDto} from './CameraDto'
