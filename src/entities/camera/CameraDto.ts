export interface CameraCalibrationDto {
  coefficients: number[]
  rSquared: number
  sampleCount: number
  calibratedAt?: string
}

export interface CameraDto {
  name: string
  position: [number, number]
  azimuthDeg: number  // Counter-clockwise from +x
  calibration?: CameraCalibrationDto
}
