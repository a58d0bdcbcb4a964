/** unix 秒。0 / null は未設定扱い */
export type Timestamp = number;

export type FormatOptions = {
  automaticenddate?: boolean;
  numsections?: number;
  [name: string]: string | number | boolean | undefined;
};

export interface Course {
  id: number;
  shortname: string;
  fullname?: string;
  sortorder: number;
  startdate: Timestamp | null;
  enddate: Timestamp | null;
  format: string;
  formatOptions: FormatOptions;
  timemodified?: Timestamp;
}

export interface GuessOptions {
  guessStart: boolean;
  guessEnd: boolean;
  guessAll: boolean;
  update: boolean;
  /** null = 絞り込みなし */
  filter: number[] | null;
}

export type DateField = "start" | "end";

export type DecisionOutcome =
  | { kind: "cant-guess"; field: DateField }
  | { kind: "unchanged"; field: DateField; value: Timestamp }
  | { kind: "guessed"; field: DateField; value: Timestamp }
  | { kind: "weeks-auto-set"; value: Timestamp | null }
  | { kind: "weeks-default" }
  | { kind: "end-before-start"; value: Timestamp };

export interface DecisionResult {
  courseId: number;
  shortname: string;
  notification: string;
  persisted: boolean;
  outcomes: DecisionOutcome[];
  /** 判定後のメモリ上のコース（更新時は再読込したもの） */
  course: Course;
}

/** CourseStore.fetch の絞り込み条件 */
export interface CourseConditions {
  excludeId: number;
  startUnset: boolean;
  endUnset: boolean;
  ids: number[] | null;
}

export type Capability = "course:view" | "course:update";

export interface StoreCapability {
  actor: string;
  can: ReadonlySet<Capability>;
}

export interface DateEstimator {
  guessStart(course: Course): Promise<Timestamp | null>;
  guessEnd(course: Course): Promise<Timestamp | null>;
}

/**
 * persist() は書き込んだ以外のフィールドも変えることがある（weeks の終了日など）。
 * 派生値が必要な呼び出し側は reload() し直すこと。
 */
export interface CourseStore {
  fetch(conditions: CourseConditions, cap: StoreCapability): Promise<Course[]>;
  persist(course: Course, cap: StoreCapability): Promise<void>;
  reload(courseId: number, cap: StoreCapability): Promise<Course>;
  recomputeWeeksEndDate(courseId: number, cap: StoreCapability): Promise<void>;
}
