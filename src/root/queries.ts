export const MEMBERS_QUERY = `
  query Members {
    members {
      memberId
      name
      discordId
      groupId
      streak {
        currentStreak
        maxStreak
      }
    }
  }
`;

export const STREAKS_QUERY = `
  query Streaks {
    streaks {
      memberId
      currentStreak
      maxStreak
    }
  }
`;

export const INCREMENT_STREAK_MUTATION = `
  mutation IncrementStreak($memberId: Int!) {
    incrementStreak(input: { memberId: $memberId }) {
      currentStreak
      maxStreak
    }
  }
`;

export const RESET_STREAK_MUTATION = `
  mutation ResetStreak($memberId: Int!) {
    resetStreak(input: { memberId: $memberId }) {
      currentStreak
      maxStreak
    }
  }
`;

export const ATTENDANCE_QUERY = `
  query Attendance($date: NaiveDate!) {
    attendanceByDate(date: $date) {
      name
      year
      isPresent
      timeIn
    }
  }
`;
