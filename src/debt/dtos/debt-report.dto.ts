// Money fields are exact decimal strings, unrounded.

export interface CourseDebtLine {
  courseId: string;
  courseName: string;
  monthlyFee: string;
  monthsEnrolled: number;
  lessonsAttended: number;
  expectedLessons: number;
  totalOwedForCourse: string;
  enrollmentDate: string;
}

export interface DebtReport {
  studentId: string;
  studentName: string;
  courseBreakdown: CourseDebtLine[];
  totalMonthlyOwed: string;
  totalPaid: string;
  balance: string;
  owesMoney: boolean;
  debtAmount: string;
  overpaidAmount: string;
}

export interface StudentDebtSummary {
  studentId: string;
  studentName: string;
  monthlyOwed: string;
  totalPaid: string;
  debt: string;
  balance: string;
}

export interface AggregateDebtReport {
  students: StudentDebtSummary[];
  totalDebtAllStudents: string;
  studentsWithDebt: number;
}

export interface CourseStudentDebt {
  studentId: string;
  studentName: string;
  monthsEnrolled: number;
  lessonsAttended: number;
  expectedLessons: number;
  courseOwed: string;
  coursePayments: string;
  balance: string;
  debt: string;
}

export interface CourseDebtReport {
  courseId: string;
  courseName: string;
  monthlyFee: string;
  students: CourseStudentDebt[];
  totalCourseDebt: string;
  studentsWithDebt: number;
}

export interface CoursePaymentTotal {
  courseId: string;
  courseName: string;
  paymentCount: number;
  totalAmount: string;
}

export interface PaymentsByCourseReport {
  courses: CoursePaymentTotal[];
  totalAmount: string;
}

export interface MonthlyPaymentTotal {
  /** 1 = January */
  month: number;
  totalAmount: string;
}

export interface MonthlyPaymentsReport {
  year: number;
  months: MonthlyPaymentTotal[];
  totalAmount: string;
}

export interface StudentMoneyTotal {
  studentCount: number;
  totalStudentMoney: string;
}
