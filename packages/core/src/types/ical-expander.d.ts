// ical-expander ships no type declarations
declare module 'ical-expander' {
  export interface ICalTime {
    toJSDate(): Date
    isDate: boolean
  }

  export interface ICalComponent {
    getFirstPropertyValue(name: string): unknown
  }

  export interface ICalEvent {
    uid: string
    startDate: ICalTime
    endDate: ICalTime
    component: ICalComponent
  }

  export interface ICalOccurrence {
    startDate: ICalTime
    endDate: ICalTime
    item: ICalEvent
  }

  export interface ICalExpanderResult {
    events: ICalEvent[]
    occurrences: ICalOccurrence[]
  }

  export interface ICalExpanderOptions {
    ics: string
    maxIterations?: number
  }

  export default class IcalExpander {
    constructor(options: ICalExpanderOptions)
    all(): ICalExpanderResult
  }
}
