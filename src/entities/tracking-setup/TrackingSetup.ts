import {makeAutoObservable} from 'mobx'
import {Camera} from '../camera/Camera'
import {TRACKING_SETUP_FORMAT_VERSION, type TrackingSetupDto} from './TrackingSetupDto'

/**
 * The set of registered cameras, passed explicitly into every estimation call.
 * Camera names are unique; insertion order is preserved and defines pair order.
 */
export class TrackingSetup {
    name: string
    private readonly camerasByName: Map<string, Camera>

    private constructor(name: string, cameras: Map<string, Camera>) {
        this.name = name
        this.camerasByName = cameras

        makeAutoObservable(this, {}, {autoBind: true})
    }

    static create(name: string = 'Untitled Setup', cameras: Camera[] = []): TrackingSetup {
        const setup = new TrackingSetup(name, new Map())
        for (const camera of cameras) {
            setup.addCamera(camera)
        }
        return setup
    }

    get cameras(): Camera[] {
        return Array.from(this.camerasByName.values())
    }

    get calibratedCameras(): Camera[] {
        return this.cameras.filter(c => c.isCalibrated)
    }

    get size(): number {
        return this.camerasByName.size
    }

    hasCamera(name: string): boolean {
        return this.camerasByName.has(name)
    }

    getCamera(name: string): Camera | undefined {
        return this.camerasByName.get(name)
    }

    requireCamera(name: string): Camera {
        const camera = this.camerasByName.get(name)
        if (!camera) {
            throw new Error(`Camera "${name}" is not registered in setup "${this.name}"`)
        }
        return camera
    }

    addCamera(camera: Camera): void {
        if (this.camerasByName.has(camera.name)) {
            throw new Error(`Camera "${camera.name}" is already registered in setup "${this.name}"`)
        }
        this.camerasByName.set(camera.name, camera)
    }

    removeCamera(name: string): boolean {
        return this.camerasByName.delete(name)
    }

    serialize(): TrackingSetupDto {
        return {
            version: TRACKING_SETUP_FORMAT_VERSION,
            name: this.name,
            cameras: this.cameras.map(c => c.serialize())
        }
    }

    static deserialize(dto: TrackingSetupDto): TrackingSetup {
        return TrackingSetup.create(dto.name ?? 'Untitled Setup', dto.cameras.map(c => Camera.deserialize(c)))
    }
}
