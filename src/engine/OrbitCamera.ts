import { vec3 } from "gl-matrix";
import { Camera } from "./Camera";

/** Spherical-coordinate camera circling a target, for the demo renders. */
export class OrbitCamera {
  theta = 0.5;
  phi = 1.0;
  radius = 4.0;
  target = vec3.create();

  /** Current eye position in world space. */
  position(): vec3 {
    return vec3.fromValues(
      this.target[0] + this.radius * Math.sin(this.phi) * Math.sin(this.theta),
      this.target[1] + this.radius * Math.cos(this.phi),
      this.target[2] + this.radius * Math.sin(this.phi) * Math.cos(this.theta),
    );
  }

  camera(aspect: number): Camera {
    return Camera.lookAt(this.position(), this.target, [0, 1, 0], {
      fovy: Math.PI / 4,
      aspect,
      near: 0.1,
      far: 100.0,
    });
  }
}
