import { CompositeFillAnimation } from "./composite";

/** Remplissage couleur puis extinction en sens inverse (effet rebond), en boucle. */
export class BounceLedAnimation extends CompositeFillAnimation {
  readonly name = "bounce";

  protected offPassReverse(): boolean {
    return !this.reverse;
  }
}
