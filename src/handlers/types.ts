import type { HandlerError } from '../errors/provider-errors';

export enum HandlerName {
  Report = 'report',
  Weather = 'weather',
  Image = 'image',
}

export type HandlerResult = { ok: true; text: string } | { ok: false; error: HandlerError };

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export interface EmergencyReportInput {
  reportText: string;
  urgency: string;
}

export interface WeatherInput {
  location: string;
}

export interface DamageImageInput {
  image?: Buffer | undefined;
}

export type Handler<TInput> = (input: TInput) => Promise<HandlerResult>;

export interface DeskHandlers {
  report: Handler<EmergencyReportInput>;
  weather: Handler<WeatherInput>;
  image: Handler<DamageImageInput>;
}
