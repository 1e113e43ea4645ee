/**
 * Waybar の custom モジュール（return-type: json）が読む形式
 */
export interface WaybarOutput {
  text: string;
  class: string;
  alt: string;
  tooltip?: string;
}
