import PDFDocument from "pdfkit";
import { formatAmount, longDate } from "../utils/format";

export interface SanctionLetterContent {
  lender: { name: string; tagline: string };
  referenceNo: string;
  issuedAt: Date;
  customer: { id: string; name: string; city: string; phone: string };
  loanAmount: number;
  tenureMonths: number;
  interestRate: number;
  emi: number;
}

const TERMS = [
  "1. This sanction is valid for 30 days from the date of this letter.",
  "2. The loan amount will be disbursed to your registered bank account within 48 hours of document submission.",
  "3. EMI will be auto-debited from your bank account on the 5th of every month.",
  "4. Prepayment is allowed after completion of 6 EMIs without any charges.",
  "5. In case of default, penal interest of 2% per month will be charged on the overdue amount.",
  "6. This sanction is subject to the terms mentioned in the loan agreement.",
];

// The standard PDF fonts have no rupee glyph
const rs = (value: number) => `Rs. ${formatAmount(value)}`;

/**
 * Render a personal loan sanction letter to an A4 PDF.
 *
 * Layout (fixed order): lender header, title, reference block, addressee,
 * subject and salutation, loan particulars table, terms and conditions,
 * signature block, disclaimer.
 */
export function renderSanctionLetterPdf(letter: SanctionLetterContent): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    try {
      const chunks: Buffer[] = [];
      const doc = new PDFDocument({
        size: "A4",
        margins: { top: 72, bottom: 72, left: 72, right: 72 },
        info: {
          Title: `Sanction Letter ${letter.referenceNo}`,
          Author: letter.lender.name,
          Subject: "Sanction of Personal Loan",
          CreationDate: letter.issuedAt,
        },
      });

      doc.on("data", (chunk: Buffer) => chunks.push(chunk));
      doc.on("end", () => resolve(Buffer.concat(chunks)));
      doc.on("error", reject);

      const startX = 72;
      const contentWidth = doc.page.width - 144;

      // ── Lender header ─────────────────────────────────
      doc.fontSize(18).font("Helvetica-Bold").fillColor("#1a365d").text(letter.lender.name.toUpperCase(), { align: "center" });
      doc.fontSize(10).font("Helvetica").fillColor("#808080").text(`(${letter.lender.tagline})`, { align: "center" });
      doc.moveDown(1.5);
      doc.fontSize(16).font("Helvetica-Bold").fillColor("#c53030").text("SANCTION LETTER", { align: "center" });
      doc.moveDown(1);

      doc.fontSize(11).fillColor("#000000");
      labelled(doc, "Reference No", letter.referenceNo);
      labelled(doc, "Date", longDate(letter.issuedAt));
      doc.moveDown(1);

      // ── Addressee ─────────────────────────────────────
      doc.font("Helvetica-Bold").text("To,");
      doc.text(letter.customer.name);
      doc.font("Helvetica").text(letter.customer.city);
      doc.text(`Phone: ${letter.customer.phone}`);
      doc.moveDown(1);

      doc.font("Helvetica-Bold").text("Subject: Sanction of Personal Loan");
      doc.moveDown(0.5);
      doc.font("Helvetica").text(`Dear ${letter.customer.name.split(" ")[0]},`);
      doc.moveDown(0.5);
      doc.text(
        "We are pleased to inform you that your Personal Loan application has been approved. " +
          "Please find below the details of your sanctioned loan:",
        { align: "justify", lineGap: 3 },
      );
      doc.moveDown(1);

      // ── Particulars table ─────────────────────────────
      const totalPayable = letter.emi * letter.tenureMonths;
      const totalInterest = totalPayable - letter.loanAmount;
      const rows: [string, string][] = [
        ["Loan Amount", rs(letter.loanAmount)],
        ["Loan Tenure", `${letter.tenureMonths} months`],
        ["Interest Rate", `${letter.interestRate}% per annum`],
        ["Monthly EMI", rs(letter.emi)],
        ["Total Interest Payable", rs(totalInterest)],
        ["Total Amount Payable", rs(totalPayable)],
        ["Processing Fee", "Nil (Waived)"],
        ["Prepayment Charges", "Nil after 6 EMIs"],
      ];
      const colW = [contentWidth * 0.55, contentWidth * 0.45];
      const rowH = 22;
      let y = doc.y;

      doc.rect(startX, y, contentWidth, rowH).fill("#1a365d");
      doc.fillColor("#ffffff").font("Helvetica-Bold").fontSize(11);
      doc.text("Particulars", startX + 8, y + 6, { width: colW[0] - 16 });
      doc.text("Details", startX + colW[0] + 8, y + 6, { width: colW[1] - 16 });
      y += rowH;

      doc.font("Helvetica").fontSize(10);
      for (const [label, value] of rows) {
        doc.rect(startX, y, contentWidth, rowH).fillAndStroke("#f7fafc", "#e2e8f0");
        doc.fillColor("#000000");
        doc.text(label, startX + 8, y + 6, { width: colW[0] - 16 });
        doc.text(value, startX + colW[0] + 8, y + 6, { width: colW[1] - 16 });
        y += rowH;
      }
      doc.x = startX;
      doc.y = y + 20;

      // ── Terms ─────────────────────────────────────────
      doc.fontSize(14).font("Helvetica-Bold").fillColor("#2d3748").text("Terms and Conditions:");
      doc.moveDown(0.5);
      doc.fontSize(11).font("Helvetica").fillColor("#000000");
      for (const term of TERMS) {
        doc.text(term, { lineGap: 3 });
      }
      doc.moveDown(1);
      doc.text(
        "Please sign and return the enclosed loan agreement along with the required documents to complete the disbursement process.",
        { lineGap: 3 },
      );
      doc.moveDown(0.5);
      doc.text(`Congratulations and thank you for choosing ${letter.lender.name}!`);
      doc.moveDown(2);

      // ── Signature ─────────────────────────────────────
      doc.font("Helvetica-Bold").text(`For ${letter.lender.name}`);
      doc.moveDown(1.5);
      doc.font("Helvetica").text("_______________________");
      doc.font("Helvetica-Bold").text("Authorized Signatory");
      doc.moveDown(2);

      doc.fontSize(8).font("Helvetica-Oblique").fillColor("#808080");
      doc.text("This is a system-generated letter and does not require a physical signature.", { align: "center" });

      doc.end();
    } catch (err) {
      reject(err);
    }
  });
}

function labelled(doc: PDFKit.PDFDocument, label: string, value: string) {
  doc.font("Helvetica-Bold").text(`${label}: `, { continued: true });
  doc.font("Helvetica").text(value);
}
