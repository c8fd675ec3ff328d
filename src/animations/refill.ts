import { CompositeFillAnimation } from "./composite";

/** Remplissage couleur puis remplissage noir, dans le même sens, en boucle. */
export class RefillLedAnimation extends CompositeFillAnimation {
  readonly name = "refill";

  protected offPassReverse(): boolean {
    return this.reverse;
  }
}
