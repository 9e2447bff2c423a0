import * as fc from 'fast-check';
import { cleanTripRecord, cleanTripRecords, parseCurrency, parseJobDate } from './record-cleaning.util';

describe('Record Cleaning Utility', () => {
  describe('parseCurrency', () => {
    it('should strip dollar signs and thousands separators', () => {
      expect(parseCurrency('$1,234.50')).toBe(1234.5);
      expect(parseCurrency('$12')).toBe(12);
      expect(parseCurrency('1,000,000')).toBe(1000000);
    });

    it('should keep signed amounts', () => {
      expect(parseCurrency('-15.25')).toBe(-15.25);
      expect(parseCurrency('$-5')).toBe(-5);
    });

    it('should pass finite numbers through', () => {
      expect(parseCurrency(42)).toBe(42);
      expect(parseCurrency(0.1)).toBe(0.1);
    });

    it('should default blank, missing and unparseable cells to 0', () => {
      expect(parseCurrency('')).toBe(0);
      expect(parseCurrency('   ')).toBe(0);
      expect(parseCurrency('n/a')).toBe(0);
      expect(parseCurrency(undefined)).toBe(0);
      expect(parseCurrency(null)).toBe(0);
      expect(parseCurrency(Number.NaN)).toBe(0);
      expect(parseCurrency(Number.POSITIVE_INFINITY)).toBe(0);
      expect(parseCurrency(true)).toBe(0);
    });

    it('should reject hex, binary and octal notation', () => {
      expect(parseCurrency('0x10')).toBe(0);
      expect(parseCurrency('0b11')).toBe(0);
      expect(parseCurrency('0o17')).toBe(0);
      expect(parseCurrency('$0x1F')).toBe(0);
    });

    it('should accept leading and trailing decimal points', () => {
      expect(parseCurrency('.5')).toBe(0.5);
      expect(parseCurrency('12.')).toBe(12);
      expect(parseCurrency('+7.25')).toBe(7.25);
    });

    it('should trim surrounding whitespace', () => {
      expect(parseCurrency(' $ 12.75 ')).toBe(12.75);
    });

    /**
     * Formatting an amount with "$" and "," never changes its parsed value
     */
    it('should parse formatted and plain amounts to the same value', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 1_000_000_000 }), cents => {
          const plain = (cents / 100).toFixed(2);
          const [whole, fraction] = plain.split('.');
          const formatted = `$${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${fraction}`;

          expect(parseCurrency(formatted)).toBe(parseCurrency(plain));
        }),
      );
    });
  });

  describe('parseJobDate', () => {
    it('should accept ISO dates and date-times', () => {
      expect(parseJobDate('2025-03-04')).toBe('2025-03-04');
      expect(parseJobDate('2025-03-04T10:15:00Z')).toBe('2025-03-04');
      expect(parseJobDate('2025-03-04 10:15:00')).toBe('2025-03-04');
    });

    it('should accept common sheet formats', () => {
      expect(parseJobDate('3/4/2025')).toBe('2025-03-04');
      expect(parseJobDate('3/4/25')).toBe('2025-03-04');
      expect(parseJobDate('12/31/2024')).toBe('2024-12-31');
      expect(parseJobDate('2025/3/4')).toBe('2025-03-04');
      expect(parseJobDate('03-04-2025')).toBe('2025-03-04');
      expect(parseJobDate('Mar 4, 2025')).toBe('2025-03-04');
      expect(parseJobDate('4 Mar 2025')).toBe('2025-03-04');
    });

    it('should accept full month names', () => {
      expect(parseJobDate('March 4, 2025')).toBe('2025-03-04');
      expect(parseJobDate('4 March 2025')).toBe('2025-03-04');
      expect(parseJobDate('September 30, 2024')).toBe('2024-09-30');
    });

    it('should accept Date instances', () => {
      expect(parseJobDate(new Date(2025, 2, 4))).toBe('2025-03-04');
      expect(parseJobDate(new Date('not a date'))).toBeNull();
    });

    it('should return null for unparseable cells', () => {
      expect(parseJobDate('2025-02-30')).toBeNull();
      expect(parseJobDate('not a date')).toBeNull();
      expect(parseJobDate('')).toBeNull();
      expect(parseJobDate(undefined)).toBeNull();
      expect(parseJobDate(45000)).toBeNull();
    });
  });

  describe('cleanTripRecord', () => {
    it('should type every column of a full row', () => {
      const record = cleanTripRecord({
        trip_id: 512345,
        driver_num: '5800905',
        first_name: 'Freddy',
        last_name: 'Ortiz',
        job_date: '3/4/2025',
        status: 'Processed',
        nacha_title: 'NACHA-0312',
        account: 'ACME',
        bank: ' 1234 ',
        routing: '021000021',
        total_paid: '$1,234.50',
        total_fare: '1,400.00',
        coop_commission: '$140.00',
        tips: 'n/a',
        tolls: 6.5,
        base_fare: '$1,200.00',
        wait_time_pay: '$20.00',
        stops_amount: '$10.00',
        cash_collected: '$25.50',
        darter: ''
      });

      expect(record).toEqual({
        tripId: '512345',
        driverNum: '5800905',
        firstName: 'Freddy',
        lastName: 'Ortiz',
        jobDate: '2025-03-04',
        status: 'Processed',
        nachaTitle: 'NACHA-0312',
        account: 'ACME',
        bank: '1234',
        routing: '021000021',
        totalPaid: 1234.5,
        totalFare: 1400,
        coopCommission: 140,
        tips: 0,
        tolls: 6.5,
        baseFare: 1200,
        waitTimePay: 20,
        stopsAmount: 10,
        cashCollected: 25.5,
        darter: 0
      });
    });

    it('should mark missing columns as null and default missing amounts to 0', () => {
      const record = cleanTripRecord({ trip_id: 'T-1', driver_num: '42' });

      expect(record.tripId).toBe('T-1');
      expect(record.firstName).toBeNull();
      expect(record.account).toBeNull();
      expect(record.bank).toBeNull();
      expect(record.jobDate).toBeNull();
      expect(record.totalPaid).toBe(0);
      expect(record.cashCollected).toBe(0);
    });

    it('should keep blank cells in present columns as empty strings', () => {
      const record = cleanTripRecord({ account: '', status: null });

      expect(record.account).toBe('');
      expect(record.status).toBe('');
    });

    it('should ignore columns outside the schema', () => {
      const record = cleanTripRecord({ trip_id: '1', vehicle: 'Van 7' });

      expect(Object.keys(record)).not.toContain('vehicle');
    });
  });

  describe('cleanTripRecords', () => {
    it('should clean every row and never throw on bad cells', () => {
      const records = cleanTripRecords([
        { trip_id: '1', total_paid: '$10.00', job_date: 'yesterday' },
        { trip_id: '2', total_paid: 'oops', job_date: '2025-01-02' }
      ]);

      expect(records.map(r => [r.tripId, r.totalPaid, r.jobDate])).toEqual([
        ['1', 10, null],
        ['2', 0, '2025-01-02']
      ]);
    });

    it('should return an empty table for no rows', () => {
      expect(cleanTripRecords([])).toEqual([]);
    });
  });
});
