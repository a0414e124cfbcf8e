// src/services/render/index.ts
import type { CalendarApp, EventDescriptor } from "../../types/events.js";
import { renderAppleCalendar } from "./appleCalendar.js";
import { renderFantastical } from "./fantastical.js";

export type RenderOptions = {
  calendarName: string | null;
  defaultDurationMinutes: number;
};

/** AppleScript that creates `event` in the chosen app */
export function renderEvent(event: EventDescriptor, app: CalendarApp, options: RenderOptions): string {
  switch (app) {
    case "fantastical":
      return renderFantastical(event, options);
    case "calendar":
      return renderAppleCalendar(event, options);
  }
}

export function appName(app: CalendarApp): string {
  return app === "fantastical" ? "Fantastical" : "Apple Calendar";
}
