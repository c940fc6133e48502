import type { BadgeRecord } from "../types.js";

/** An in-game pinned badge. */
export class Badge {
  readonly iconImg: string;
  readonly iconColor: string;
  readonly overlayImg: string;
  readonly overlayColor: string;

  constructor(record: BadgeRecord) {
    this.iconImg = record.iconImg;
    this.iconColor = record.iconColor;
    this.overlayImg = record.overlayImg;
    this.overlayColor = record.overlayColor;
    Object.freeze(this);
  }

  toJSON(): BadgeRecord {
    return {
      iconImg: this.iconImg,
      iconColor: this.iconColor,
      overlayImg: this.overlayImg,
      overlayColor: this.overlayColor,
    };
  }
}
